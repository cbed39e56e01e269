/**
 * Catalogo de taxonomias de incidentes ANCI.
 *
 * Se carga desde `data/taxonomias.json` y se valida una sola vez al importar.
 */
import { z } from 'zod';
import datosTaxonomias from '../../../../data/taxonomias.json';
import type { TipoEmpresa } from '../../modulo_incidentes/domain/plazos';

const esquemaTaxonomia = z.object({
  codigo: z.string().regex(/^INC_[A-Z]+_[A-Z]+_[A-Z]+$/),
  area: z.string().min(1),
  efecto: z.string().min(1),
  categoria: z.string().min(1),
  subcategoria: z.string(),
  aplicaA: z.enum(['AMBAS', 'OIV', 'PSE'])
});

export type Taxonomia = z.infer<typeof esquemaTaxonomia>;

const CATALOGO: readonly Taxonomia[] = z.array(esquemaTaxonomia).parse(datosTaxonomias);

/** OIV ve OIV + AMBAS; PSE ve PSE + AMBAS; una empresa AMBAS ve todo. */
export function taxonomiaAplica(taxonomia: Taxonomia, tipoEmpresa: TipoEmpresa): boolean {
  if (tipoEmpresa === 'AMBAS' || taxonomia.aplicaA === 'AMBAS') return true;
  return taxonomia.aplicaA === tipoEmpresa;
}

export function listarTaxonomias(filtro: { tipoEmpresa?: TipoEmpresa; area?: string } = {}): Taxonomia[] {
  const area = filtro.area?.trim().toLowerCase();
  return CATALOGO.filter((tax) => {
    if (filtro.tipoEmpresa && !taxonomiaAplica(tax, filtro.tipoEmpresa)) return false;
    if (area && !tax.area.toLowerCase().includes(area)) return false;
    return true;
  });
}

export function obtenerTaxonomia(codigo: string): Taxonomia | null {
  return CATALOGO.find((tax) => tax.codigo === codigo) ?? null;
}

export function areasTaxonomia(): string[] {
  return Array.from(new Set(CATALOGO.map((tax) => tax.area)));
}
