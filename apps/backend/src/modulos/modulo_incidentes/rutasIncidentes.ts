/**
 * Rutas de incidentes.
 */
import { Router } from 'express';
import multer from 'multer';
import { validarConsulta, validarCuerpo } from '../../compartido/validaciones/validar';
import { configuracion } from '../../configuracion';
import type { Dependencias } from '../../dependencias';
import { requerirPermiso } from '../modulo_autenticacion/middlewarePermisos';
import { crearControladorIncidentes } from './controladorIncidentes';
import { ServicioEvidencias } from './servicioEvidencias';
import { ServicioIncidentes } from './servicioIncidentes';
import {
  esquemaActualizarTaxonomia,
  esquemaAgregarTaxonomia,
  esquemaCambiarEstado,
  esquemaConsultaIncidentes,
  esquemaConsultaValidacion,
  esquemaCrearIncidente,
  esquemaGuardarEdicion,
  esquemaReporteEnviado,
  esquemaSubirEvidencia
} from './validacionesIncidentes';

export function crearRutasIncidentes(deps: Dependencias) {
  const router = Router();
  const incidentes = new ServicioIncidentes(deps);
  const evidencias = new ServicioEvidencias(incidentes, deps.almacen);
  const controlador = crearControladorIncidentes({ incidentes, evidencias });

  // En memoria: el servicio calcula hash y valida antes de escribir al almacen.
  const subida = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: configuracion.evidenciaMaxMb * 1024 * 1024, files: 1 }
  });

  const leer = requerirPermiso('incidentes:leer');
  const gestionar = requerirPermiso('incidentes:gestionar');

  router.get('/', leer, validarConsulta(esquemaConsultaIncidentes), controlador.listar);
  router.post('/', gestionar, validarCuerpo(esquemaCrearIncidente), controlador.crear);
  router.get('/:incidenteId', leer, controlador.obtener);
  router.delete('/:incidenteId', requerirPermiso('incidentes:eliminar'), controlador.eliminar);
  router.patch('/:incidenteId/estado', gestionar, validarCuerpo(esquemaCambiarEstado), controlador.cambiarEstado);
  router.get('/:incidenteId/historial', leer, controlador.historial);

  router.get('/:incidenteId/semilla', leer, controlador.semillaBase);
  router.get('/:incidenteId/semilla/original', leer, controlador.semillaOriginal);
  router.post('/:incidenteId/edicion', gestionar, controlador.cargarEdicion);
  router.put('/:incidenteId/edicion', gestionar, validarCuerpo(esquemaGuardarEdicion), controlador.guardarEdicion);
  router.delete('/:incidenteId/edicion', gestionar, controlador.descartarEdicion);
  router.post('/:incidenteId/restaurar-original', gestionar, controlador.restaurarOriginal);

  router.get('/:incidenteId/taxonomias', leer, controlador.listarTaxonomias);
  router.post('/:incidenteId/taxonomias', gestionar, validarCuerpo(esquemaAgregarTaxonomia), controlador.agregarTaxonomia);
  router.patch(
    '/:incidenteId/taxonomias/:idUnico',
    gestionar,
    validarCuerpo(esquemaActualizarTaxonomia),
    controlador.actualizarTaxonomia
  );
  router.delete('/:incidenteId/taxonomias/:idUnico', gestionar, controlador.eliminarTaxonomia);

  router.get('/:incidenteId/evidencias', leer, controlador.listarEvidencias);
  router.post(
    '/:incidenteId/evidencias',
    requerirPermiso('evidencias:gestionar'),
    subida.single('archivo'),
    validarCuerpo(esquemaSubirEvidencia),
    controlador.subirEvidencia
  );
  router.get('/:incidenteId/evidencias/:archivoId/descarga', leer, controlador.descargarEvidencia);
  router.delete('/:incidenteId/evidencias/:archivoId', requerirPermiso('evidencias:gestionar'), controlador.eliminarEvidencia);

  router.get('/:incidenteId/validacion-anci', leer, validarConsulta(esquemaConsultaValidacion), controlador.validarAnci);
  router.get('/:incidenteId/plazos', leer, controlador.plazos);
  router.post(
    '/:incidenteId/reportes-enviados',
    requerirPermiso('informes:registrar_envio'),
    validarCuerpo(esquemaReporteEnviado),
    controlador.registrarReporteEnviado
  );

  return router;
}
