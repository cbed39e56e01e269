/**
 * Controlador del catalogo de taxonomias.
 */
import type { Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { listarTaxonomias, obtenerTaxonomia } from './domain/catalogoTaxonomias';
import type { ConsultaTaxonomias } from './validacionesTaxonomias';

export async function listar(_req: Request, res: Response) {
  const consulta: ConsultaTaxonomias = res.locals.consulta;
  const taxonomias = listarTaxonomias(consulta);
  res.json({ taxonomias, total: taxonomias.length });
}

export async function obtener(req: Request, res: Response) {
  const codigo = String(req.params.codigo ?? '').trim().toUpperCase();
  const taxonomia = obtenerTaxonomia(codigo);
  if (!taxonomia) {
    throw new ErrorAplicacion('TAXONOMIA_NO_ENCONTRADA', `Taxonomia ${codigo} no existe`, 404);
  }
  res.json({ taxonomia });
}
