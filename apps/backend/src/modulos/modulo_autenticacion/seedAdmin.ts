/**
 * Alta del administrador inicial desde `SEED_ADMIN_*`.
 */
import { log } from '../../infraestructura/logging/logger';
import { crearHash } from './servicioHash';
import type { RepositorioUsuarios } from './shared/tiposAutenticacion';

function debeSembrar(): boolean {
  const env = String(process.env.NODE_ENV || '').toLowerCase();
  if (env !== 'production') return true;
  return String(process.env.SEED_ADMIN_FORZAR || '').toLowerCase() === 'true';
}

export async function seedAdmin(usuarios: RepositorioUsuarios) {
  if (!debeSembrar()) return;

  const correo = String(process.env.SEED_ADMIN_CORREO || '').trim().toLowerCase();
  const contrasena = String(process.env.SEED_ADMIN_CONTRASENA || '');
  const nombre = String(process.env.SEED_ADMIN_NOMBRE || 'Administrador').trim();
  if (!correo || !contrasena) return;

  const existente = await usuarios.buscarPorCorreo(correo);
  if (existente) {
    const cambios: { roles?: string[]; activo?: boolean } = {};
    if (!existente.roles.includes('admin')) cambios.roles = [...existente.roles, 'admin'];
    if (!existente.activo) cambios.activo = true;
    if (Object.keys(cambios).length) await usuarios.actualizar(existente.id, cambios);
    return;
  }

  await usuarios.crear({
    correo,
    nombre,
    hashContrasena: await crearHash(contrasena),
    roles: ['admin'],
    empresas: [],
    activo: true
  });
  log('ok', 'Administrador inicial creado', { correo });
}
