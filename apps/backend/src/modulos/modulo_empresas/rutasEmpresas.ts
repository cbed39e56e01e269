/**
 * Rutas de empresas.
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { Dependencias } from '../../dependencias';
import { requerirPermiso } from '../modulo_autenticacion/middlewarePermisos';
import { crearControladorEmpresas } from './controladorEmpresas';
import { esquemaActualizarEmpresa, esquemaCrearEmpresa } from './validacionesEmpresas';

export function crearRutasEmpresas(deps: Dependencias) {
  const router = Router();
  const controlador = crearControladorEmpresas(deps);

  router.get('/', requerirPermiso('empresas:leer'), controlador.listar);
  router.post('/', requerirPermiso('empresas:gestionar'), validarCuerpo(esquemaCrearEmpresa), controlador.crear);
  router.get('/:empresaId', requerirPermiso('empresas:leer'), controlador.obtener);
  router.patch(
    '/:empresaId',
    requerirPermiso('empresas:gestionar'),
    validarCuerpo(esquemaActualizarEmpresa),
    controlador.actualizar
  );
  router.delete('/:empresaId', requerirPermiso('empresas:gestionar'), controlador.desactivar);
  router.get('/:empresaId/secciones', requerirPermiso('empresas:leer'), controlador.secciones);

  return router;
}
