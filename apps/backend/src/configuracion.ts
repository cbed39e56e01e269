/**
 * Configuracion centralizada del backend.
 */
import dotenv from 'dotenv';
import path from 'node:path';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: path.resolve(__dirname, '..', '..', '..', '.env')
});

const puerto = Number(process.env.PUERTO_API ?? process.env.PORT ?? 4000);
const mongoUri = process.env.MONGODB_URI ?? process.env.MONGO_URI ?? '';
const entorno = process.env.NODE_ENV ?? 'development';
const limiteJson = process.env.LIMITE_JSON ?? '10mb';
const corsOrigenes = (process.env.CORS_ORIGENES ?? 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

export function parsearNumeroSeguro(
  valor: unknown,
  porDefecto: number,
  { min, max }: { min?: number; max?: number } = {}
) {
  if (valor === undefined || valor === null || String(valor).trim() === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

// En producción, el secreto JWT debe ser proporcionado por entorno.
// En desarrollo/test se permite un valor por defecto para facilitar el setup.
const jwtSecreto = process.env.JWT_SECRETO ?? '';
if (entorno === 'production' && !jwtSecreto) {
  throw new Error('JWT_SECRETO es requerido en producción');
}
if (entorno === 'production' && !mongoUri) {
  throw new Error('MONGODB_URI es requerido en producción');
}
const jwtSecretoEfectivo = jwtSecreto || 'cambia-este-secreto';
const jwtExpiraHoras = parsearNumeroSeguro(process.env.JWT_EXPIRA_HORAS, 8, { min: 1, max: 72 });
const bcryptRondas = Math.round(parsearNumeroSeguro(process.env.BCRYPT_RONDAS, 12, { min: 4, max: 15 }));

// Rate limit: configurable por entorno para tuning y para pruebas deterministas.
const rateLimitWindowMs = parsearNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = parsearNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 300, { min: 1, max: 10_000 });
const rateLimitCredencialesLimit = parsearNumeroSeguro(
  process.env.RATE_LIMIT_CREDENCIALES_LIMIT,
  entorno === 'production' ? 40 : 120,
  { min: 1, max: 10_000 }
);

// Archivos de evidencia e informes generados.
const archivosDir = path.resolve(process.env.ARCHIVOS_DIR ?? path.join(process.cwd(), 'data', 'archivos'));
const plantillasDir = path.resolve(process.env.PLANTILLAS_DIR ?? path.resolve(__dirname, '..', 'plantillas'));
const evidenciaMaxMb = parsearNumeroSeguro(process.env.EVIDENCIA_MAX_MB, 50, { min: 1, max: 200 });

// Reglas de plazo ANCI.
const plazoInformeFinalDias = Math.round(parsearNumeroSeguro(process.env.PLAZO_INFORME_FINAL_DIAS, 15, { min: 1, max: 60 }));
const umbralPorVencer = parsearNumeroSeguro(process.env.UMBRAL_POR_VENCER, 0.25, { min: 0, max: 1 });
const zonaHoraria = String(process.env.ZONA_HORARIA ?? 'America/Santiago').trim() || 'America/Santiago';

export const configuracion = {
  puerto,
  mongoUri,
  entorno,
  limiteJson,
  corsOrigenes,
  jwtSecreto: jwtSecretoEfectivo,
  jwtExpiraHoras,
  bcryptRondas,
  rateLimitWindowMs,
  rateLimitLimit,
  rateLimitCredencialesLimit,
  archivosDir,
  plantillasDir,
  evidenciaMaxMb,
  plazoInformeFinalDias,
  umbralPorVencer,
  zonaHoraria
};
