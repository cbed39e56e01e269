// Esquemas Zod reutilizables (contratos HTTP).
import { z } from 'zod';
import { TIPOS_EMPRESA, TIPOS_INFORME } from '../../modulos/modulo_incidentes/domain/plazos';

// ObjectId de Mongo en formato hexadecimal (24 chars).
export const esquemaObjectId = z.string().trim().regex(/^[0-9a-fA-F]{24}$/);

export const esquemaTipoEmpresa = z.enum(TIPOS_EMPRESA);
export const esquemaTipoInforme = z.enum(TIPOS_INFORME);

export const esquemaTextoCorto = z.string().trim().max(300);
export const esquemaTextoLargo = z.string().max(20_000);

// Fecha ISO 8601 (con zona) como string; se convierte a Date en el servicio.
export const esquemaFechaIso = z.string().datetime({ offset: true });
