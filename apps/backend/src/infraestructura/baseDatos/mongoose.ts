/**
 * Conexion a MongoDB. Sin `MONGODB_URI` la API arranca igual y `/api/salud/ready`
 * reporta la base como desconectada.
 */
import mongoose from 'mongoose';
import { configuracion } from '../../configuracion';
import { log, logError } from '../logging/logger';

export async function conectarBaseDatos(): Promise<boolean> {
  if (!configuracion.mongoUri) {
    log('warn', 'MONGODB_URI ausente; incidentes y empresas no se persistiran');
    return false;
  }

  mongoose.set('strictQuery', true);
  mongoose.connection.on('disconnected', () => log('warn', 'MongoDB desconectado'));

  try {
    await mongoose.connect(configuracion.mongoUri);
  } catch (error) {
    logError('No se pudo conectar a MongoDB', error);
    throw error;
  }
  log('ok', 'MongoDB conectado', { baseDatos: mongoose.connection.name });
  return true;
}
