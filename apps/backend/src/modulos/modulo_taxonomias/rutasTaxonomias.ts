/**
 * Rutas del catalogo de taxonomias.
 */
import { Router } from 'express';
import { validarConsulta } from '../../compartido/validaciones/validar';
import { requerirPermiso } from '../modulo_autenticacion/middlewarePermisos';
import { listar, obtener } from './controladorTaxonomias';
import { esquemaConsultaTaxonomias } from './validacionesTaxonomias';

const router = Router();

router.get('/', requerirPermiso('taxonomias:leer'), validarConsulta(esquemaConsultaTaxonomias), listar);
router.get('/:codigo', requerirPermiso('taxonomias:leer'), obtener);

export default router;
