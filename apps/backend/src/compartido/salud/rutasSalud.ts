/**
 * Endpoint de salud para monitoreo de API, base de datos y almacen de archivos.
 */
import { Router } from 'express';
import mongoose from 'mongoose';
import { promises as fs, constants as fsConstants } from 'node:fs';
import { configuracion } from '../../configuracion';
import type { RespuestaLiveness, RespuestaReadiness, RespuestaSalud } from '../tipos/observabilidad';

const router = Router();

const ESTADOS_DB = ['desconectado', 'conectado', 'conectando', 'desconectando'];

function estadoDb() {
  const estado = mongoose.connection.readyState; // 0,1,2,3
  return { estado, descripcion: ESTADOS_DB[estado] ?? 'desconocido' };
}

async function almacenDisponible(): Promise<boolean> {
  try {
    await fs.mkdir(configuracion.archivosDir, { recursive: true });
    await fs.access(configuracion.archivosDir, fsConstants.W_OK);
    return true;
  } catch {
    return false;
  }
}

router.get('/', (_req, res) => {
  const payload: RespuestaSalud & { db: { estado: number; descripcion: string } } = {
    estado: 'ok',
    tiempoActivo: process.uptime(),
    db: estadoDb()
  };
  res.json(payload);
});

router.get('/live', (_req, res) => {
  const payload: RespuestaLiveness = {
    estado: 'ok',
    tiempoActivo: process.uptime(),
    servicio: 'api-agente-digital',
    env: process.env.NODE_ENV ?? 'development'
  };
  res.json(payload);
});

router.get('/ready', async (_req, res) => {
  const db = estadoDb();
  const dbLista = db.estado === 1;
  const almacenListo = await almacenDisponible();
  const lista = dbLista && almacenListo;
  const payload: RespuestaReadiness = {
    estado: lista ? 'ok' : 'degradado',
    tiempoActivo: process.uptime(),
    dependencias: {
      db: { ...db, lista: dbLista },
      almacen: { ruta: configuracion.archivosDir, lista: almacenListo }
    }
  };
  res.status(lista ? 200 : 503).json(payload);
});

export default router;
