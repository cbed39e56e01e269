/**
 * Hash de contrasenas con bcryptjs.
 */
import bcrypt from 'bcryptjs';
import { configuracion } from '../../configuracion';

export async function crearHash(contrasena: string): Promise<string> {
  return bcrypt.hash(contrasena, configuracion.bcryptRondas);
}

export async function compararContrasena(contrasena: string, hash: string): Promise<boolean> {
  if (!hash) return false;
  return bcrypt.compare(contrasena, hash);
}
