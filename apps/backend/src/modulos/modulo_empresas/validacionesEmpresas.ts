/**
 * Validaciones de empresas.
 */
import { z } from 'zod';
import { esquemaTextoCorto, esquemaTipoEmpresa } from '../../compartido/validaciones/esquemas';
import { esRutValido, normalizarRut } from '../../compartido/utilidades/rut';

export const esquemaRut = z
  .string()
  .trim()
  .refine(esRutValido, { message: 'RUT invalido (digito verificador no coincide)' })
  .transform(normalizarRut);

export const esquemaCrearEmpresa = z
  .object({
    razonSocial: esquemaTextoCorto.min(1),
    rut: esquemaRut,
    tipoEmpresa: esquemaTipoEmpresa,
    sectorEsencial: esquemaTextoCorto.default(''),
    correoContacto: z.string().trim().email().or(z.literal('')).default('')
  })
  .strict();

export type CrearEmpresaPayload = z.infer<typeof esquemaCrearEmpresa>;

export const esquemaActualizarEmpresa = z
  .object({
    razonSocial: esquemaTextoCorto.min(1).optional(),
    tipoEmpresa: esquemaTipoEmpresa.optional(),
    sectorEsencial: esquemaTextoCorto.optional(),
    correoContacto: z.string().trim().email().or(z.literal('')).optional(),
    activa: z.boolean().optional()
  })
  .strict()
  .refine((datos) => Object.keys(datos).length > 0, { message: 'Sin cambios' });

export type ActualizarEmpresaPayload = z.infer<typeof esquemaActualizarEmpresa>;
