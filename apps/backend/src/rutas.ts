/**
 * Registro central de rutas del API.
 *
 * Convenciones:
 * - Las rutas publicas se montan antes del middleware de autenticacion.
 * - A partir de `requerirUsuario`, todo requiere JWT (Bearer); cada modulo
 *   aplica ademas sus permisos y el alcance por empresa.
 *
 * Nota: El orden de `router.use(...)` es parte del contrato de seguridad.
 */
import { Router } from 'express';
import rutasSalud from './compartido/salud/rutasSalud';
import { exportarMetricasPrometheus } from './compartido/observabilidad/metrics';
import type { Dependencias } from './dependencias';
import { requerirUsuario } from './modulos/modulo_autenticacion/middlewareAutenticacion';
import { crearRutasAutenticacion } from './modulos/modulo_autenticacion/rutasAutenticacion';
import { crearRutasEmpresas } from './modulos/modulo_empresas/rutasEmpresas';
import { crearRutasIncidentes } from './modulos/modulo_incidentes/rutasIncidentes';
import { crearRutasInformesAnci } from './modulos/modulo_informes_anci/rutasInformesAnci';
import rutasTaxonomias from './modulos/modulo_taxonomias/rutasTaxonomias';

export function crearRouterApi(deps: Dependencias) {
  const router = Router();

  // Endpoints sin autenticacion (health checks, metricas y login).
  router.use('/salud', rutasSalud);
  router.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(exportarMetricasPrometheus());
  });
  router.use('/autenticacion', crearRutasAutenticacion(deps));

  router.use(requerirUsuario);
  router.use('/empresas', crearRutasEmpresas(deps));
  router.use('/taxonomias', rutasTaxonomias);
  router.use('/incidentes', crearRutasIncidentes(deps));
  router.use('/informes-anci', crearRutasInformesAnci(deps));

  return router;
}
