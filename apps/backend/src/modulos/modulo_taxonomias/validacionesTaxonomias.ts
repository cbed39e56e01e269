/**
 * Validaciones del catalogo de taxonomias.
 */
import { z } from 'zod';
import { esquemaTipoEmpresa } from '../../compartido/validaciones/esquemas';

export const esquemaConsultaTaxonomias = z
  .object({
    tipoEmpresa: esquemaTipoEmpresa.optional(),
    area: z.string().trim().max(200).optional()
  })
  .strict();

export type ConsultaTaxonomias = z.infer<typeof esquemaConsultaTaxonomias>;
