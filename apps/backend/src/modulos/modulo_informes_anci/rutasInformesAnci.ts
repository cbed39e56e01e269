/**
 * Rutas de informes ANCI.
 */
import { Router } from 'express';
import { validarConsulta, validarCuerpo } from '../../compartido/validaciones/validar';
import { configuracion } from '../../configuracion';
import type { Dependencias } from '../../dependencias';
import { requerirPermiso } from '../modulo_autenticacion/middlewarePermisos';
import { ServicioIncidentes } from '../modulo_incidentes/servicioIncidentes';
import { crearControladorInformesAnci } from './controladorInformesAnci';
import { ServicioInformesAnci } from './servicioInformesAnci';
import { esquemaConsultaEmpresa, esquemaGenerarInforme } from './validacionesInformes';

export function crearRutasInformesAnci(deps: Dependencias) {
  const router = Router();
  const servicio = new ServicioInformesAnci(deps, new ServicioIncidentes(deps), {
    plantillasDir: configuracion.plantillasDir,
    zonaHoraria: configuracion.zonaHoraria,
    diasInformeFinal: configuracion.plazoInformeFinalDias
  });
  const controlador = crearControladorInformesAnci(servicio);
  const leer = requerirPermiso('informes:leer');

  router.get('/plantillas', leer, validarConsulta(esquemaConsultaEmpresa), controlador.plantillas);
  router.get('/cuenta-regresiva', leer, validarConsulta(esquemaConsultaEmpresa), controlador.cuentaRegresiva);
  router.post(
    '/incidentes/:incidenteId',
    requerirPermiso('informes:generar'),
    validarCuerpo(esquemaGenerarInforme),
    controlador.generar
  );
  router.get('/incidentes/:incidenteId', leer, controlador.historial);
  router.get('/:informeId/descarga', leer, controlador.descargar);

  return router;
}
