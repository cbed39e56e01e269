/**
 * Tokens JWT para sesiones de usuario.
 *
 * - Firma con `configuracion.jwtSecreto`.
 * - Expira segun `configuracion.jwtExpiraHoras`.
 * - Por defecto (secret string) jsonwebtoken usa HS256.
 */
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { configuracion } from '../../configuracion';

const esquemaPayload = z.object({
  usuarioId: z.string().min(1),
  roles: z.array(z.string()).default([]),
  empresas: z.array(z.string()).default([])
});

export type TokenUsuarioPayload = z.infer<typeof esquemaPayload>;

export function crearTokenUsuario(payload: { usuarioId: string; roles?: string[]; empresas?: string[] }) {
  return jwt.sign(
    { usuarioId: payload.usuarioId, roles: payload.roles ?? [], empresas: payload.empresas ?? [] },
    configuracion.jwtSecreto,
    { expiresIn: `${configuracion.jwtExpiraHoras}h` }
  );
}

/**
 * Verifica el JWT y devuelve el payload tipado.
 * Lanza error si el token es invalido, expiro o no trae `usuarioId`.
 */
export function verificarTokenUsuario(token: string): TokenUsuarioPayload {
  const decodificado = jwt.verify(token, configuracion.jwtSecreto);
  return esquemaPayload.parse(decodificado);
}
