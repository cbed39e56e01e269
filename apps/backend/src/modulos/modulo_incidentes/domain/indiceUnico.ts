/**
 * Identificador visible del incidente: `{correlativo}_{rutSinDv}_INC_{titulo}`.
 */
import { rutSinDigitoVerificador } from '../../../compartido/utilidades/rut';
import { normalizarParaNombreArchivo } from '../../../compartido/utilidades/texto';

export const LARGO_MAXIMO_INDICE = 50;

export function construirIndiceUnico(correlativo: number, rutEmpresa: string, titulo: string): string {
  const tituloNormalizado = normalizarParaNombreArchivo(titulo, { maxLen: LARGO_MAXIMO_INDICE }) || 'SIN_TITULO';
  const indice = `${correlativo}_${rutSinDigitoVerificador(rutEmpresa)}_INC_${tituloNormalizado}`;
  if (indice.length <= LARGO_MAXIMO_INDICE) return indice;
  return indice.slice(0, LARGO_MAXIMO_INDICE).replace(/[-_.]+$/, '');
}
