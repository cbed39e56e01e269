/**
 * Validaciones de payloads de informes ANCI.
 */
import { z } from 'zod';
import { esquemaObjectId, esquemaTipoInforme } from '../../compartido/validaciones/esquemas';

export const esquemaGenerarInforme = z
  .object({
    tipoInforme: esquemaTipoInforme,
    formato: z.enum(['docx', 'json']).default('docx'),
    forzar: z.boolean().default(false)
  })
  .strict();

export type GenerarInformePayload = z.infer<typeof esquemaGenerarInforme>;

export const esquemaConsultaEmpresa = z
  .object({
    empresaId: esquemaObjectId.optional()
  })
  .strict();

export type ConsultaEmpresa = z.infer<typeof esquemaConsultaEmpresa>;
