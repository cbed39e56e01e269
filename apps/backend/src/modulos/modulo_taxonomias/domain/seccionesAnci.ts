/**
 * Configuracion de secciones del formulario ANCI (`data/secciones-anci.json`).
 *
 * Las secciones FIJA aplican siempre; las TAXONOMIA se filtran por tipo de empresa.
 */
import { z } from 'zod';
import datosSecciones from '../../../../data/secciones-anci.json';
import type { TipoEmpresa } from '../../modulo_incidentes/domain/plazos';

const esquemaSeccion = z.object({
  codigo: z.string().min(1),
  tipo: z.enum(['FIJA', 'TAXONOMIA']),
  numeroOrden: z.number().int().positive(),
  titulo: z.string().min(1),
  descripcion: z.string(),
  aplicaOIV: z.boolean(),
  aplicaPSE: z.boolean(),
  maxArchivos: z.number().int().min(0),
  maxSizeMb: z.number().min(0)
});

export type SeccionAnci = z.infer<typeof esquemaSeccion>;

const SECCIONES: readonly SeccionAnci[] = z.array(esquemaSeccion).parse(datosSecciones);

export function seccionesParaEmpresa(tipoEmpresa: TipoEmpresa): SeccionAnci[] {
  return SECCIONES.filter((seccion) => {
    if (seccion.tipo === 'FIJA' || tipoEmpresa === 'AMBAS') return true;
    return tipoEmpresa === 'OIV' ? seccion.aplicaOIV : seccion.aplicaPSE;
  }).sort((a, b) => a.numeroOrden - b.numeroOrden);
}

export function obtenerSeccion(codigo: string): SeccionAnci | null {
  return SECCIONES.find((seccion) => seccion.codigo === codigo) ?? null;
}
