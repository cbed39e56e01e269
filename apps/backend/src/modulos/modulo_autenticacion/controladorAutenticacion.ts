/**
 * Controlador de autenticacion.
 */
import type { Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Reloj } from '../../compartido/tipos/reloj';
import { normalizarRoles, permisosComoLista } from '../../infraestructura/seguridad/rbac';
import { log } from '../../infraestructura/logging/logger';
import { obtenerContexto, type SolicitudAutenticada } from './middlewareAutenticacion';
import { compararContrasena, crearHash } from './servicioHash';
import { crearTokenUsuario } from './servicioTokens';
import { aUsuarioPublico, type RepositorioUsuarios } from './shared/tiposAutenticacion';
import type { CrearUsuarioPayload, IngresarPayload } from './validacionesAutenticacion';

function rolesParaToken(roles: unknown): string[] {
  const normalizados = normalizarRoles(roles);
  return normalizados.length > 0 ? normalizados : ['lector'];
}

export function crearControladorAutenticacion(deps: { usuarios: RepositorioUsuarios; reloj: Reloj }) {
  async function ingresar(req: Request, res: Response) {
    const { correo, contrasena }: IngresarPayload = req.body;
    const usuario = await deps.usuarios.buscarPorCorreo(correo);

    // Mismo codigo para correo inexistente, contrasena erronea o cuenta inactiva.
    const ok = usuario ? await compararContrasena(contrasena, usuario.hashContrasena) : false;
    if (!usuario || !ok || !usuario.activo) {
      log('warn', 'Intento de ingreso rechazado', { correo });
      throw new ErrorAplicacion('CREDENCIALES_INVALIDAS', 'Credenciales invalidas', 401);
    }

    await deps.usuarios.actualizar(usuario.id, { ultimoAcceso: deps.reloj.now() });
    const roles = rolesParaToken(usuario.roles);
    const token = crearTokenUsuario({ usuarioId: usuario.id, roles, empresas: usuario.empresas });
    res.json({ token, usuario: { id: usuario.id, nombre: usuario.nombre, correo: usuario.correo, roles } });
  }

  async function perfil(req: SolicitudAutenticada, res: Response) {
    const { usuarioId } = obtenerContexto(req);
    const usuario = await deps.usuarios.buscarPorId(usuarioId);
    if (!usuario) {
      throw new ErrorAplicacion('USUARIO_NO_ENCONTRADO', 'Usuario no encontrado', 404);
    }
    const roles = rolesParaToken(usuario.roles);
    res.json({ usuario: { ...aUsuarioPublico(usuario), roles, permisos: permisosComoLista(roles) } });
  }

  async function crearUsuario(req: SolicitudAutenticada, res: Response) {
    const datos: CrearUsuarioPayload = req.body;
    const existente = await deps.usuarios.buscarPorCorreo(datos.correo);
    if (existente) {
      throw new ErrorAplicacion('USUARIO_DUPLICADO', 'Ya existe un usuario con ese correo', 409);
    }
    const usuario = await deps.usuarios.crear({
      correo: datos.correo,
      nombre: datos.nombre,
      hashContrasena: await crearHash(datos.contrasena),
      roles: datos.roles,
      empresas: datos.empresas,
      activo: true
    });
    res.status(201).json({ usuario: aUsuarioPublico(usuario) });
  }

  return { ingresar, perfil, crearUsuario };
}
