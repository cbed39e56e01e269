/**
 * Middleware para requerir sesion via JWT.
 *
 * Formato esperado: `Authorization: Bearer <token>`.
 * Si el token es valido, se adjuntan `usuarioId`, roles y empresas al request
 * para que los controladores apliquen autorizacion por objeto.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { tieneAlcanceGlobal } from '../../infraestructura/seguridad/rbac';
import { verificarTokenUsuario } from './servicioTokens';

export type SolicitudAutenticada = Request & {
  usuarioId?: string;
  usuarioRoles?: string[];
  usuarioEmpresas?: string[];
};

/** Contexto de la sesion que recibe la capa de servicios. */
export type ContextoUsuario = {
  usuarioId: string;
  roles: string[];
  empresas: string[];
};

export function requerirUsuario(req: SolicitudAutenticada, res: Response, next: NextFunction) {
  const auth = req.headers.authorization ?? '';
  const [tipo, token] = auth.split(' ');

  if (tipo !== 'Bearer' || !token) {
    next(new ErrorAplicacion('NO_AUTORIZADO', 'Token requerido', 401));
    return;
  }

  try {
    const payload = verificarTokenUsuario(token);
    req.usuarioId = payload.usuarioId;
    req.usuarioRoles = payload.roles;
    req.usuarioEmpresas = payload.empresas;
    res.locals.usuarioId = payload.usuarioId;
    next();
  } catch {
    // `jsonwebtoken.verify` lanza si el token es invalido o expiro; zod si el payload no calza.
    next(new ErrorAplicacion('TOKEN_INVALIDO', 'Token invalido o expirado', 401));
  }
}

export function obtenerContexto(req: SolicitudAutenticada): ContextoUsuario {
  if (!req.usuarioId) {
    // Error de uso interno (p. ej., se llamo sin `requerirUsuario` antes).
    throw new ErrorAplicacion('NO_AUTORIZADO', 'Sesion requerida', 401);
  }
  return { usuarioId: req.usuarioId, roles: req.usuarioRoles ?? [], empresas: req.usuarioEmpresas ?? [] };
}

export function puedeVerEmpresa(contexto: ContextoUsuario, empresaId: string): boolean {
  return tieneAlcanceGlobal(contexto.roles) || contexto.empresas.includes(empresaId);
}

export function asegurarAccesoEmpresa(contexto: ContextoUsuario, empresaId: string) {
  if (!puedeVerEmpresa(contexto, empresaId)) {
    throw new ErrorAplicacion('SIN_ACCESO_EMPRESA', 'Sin acceso a la empresa solicitada', 403);
  }
}
