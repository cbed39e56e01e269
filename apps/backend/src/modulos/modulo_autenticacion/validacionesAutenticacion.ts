/**
 * Validaciones de autenticacion.
 */
import { z } from 'zod';
import { ROLES } from '../../infraestructura/seguridad/rbac';
import { esquemaObjectId } from '../../compartido/validaciones/esquemas';

const esquemaCorreo = z.string().trim().toLowerCase().email();

export const esquemaIngresar = z
  .object({
    correo: esquemaCorreo,
    contrasena: z.string().min(1).max(200)
  })
  .strict();

export type IngresarPayload = z.infer<typeof esquemaIngresar>;

export const esquemaCrearUsuario = z
  .object({
    correo: esquemaCorreo,
    nombre: z.string().trim().min(1).max(200),
    contrasena: z.string().min(8).max(200),
    roles: z.array(z.enum(ROLES)).min(1).default(['cliente']),
    empresas: z.array(esquemaObjectId).default([])
  })
  .strict();

export type CrearUsuarioPayload = z.infer<typeof esquemaCrearUsuario>;
