/**
 * Controlador de incidentes: CRUD, semilla, taxonomias, evidencias y plazos.
 *
 * Las respuestas de incidente usan la vista resumida (`aResumen`); la semilla
 * completa se expone solo en los endpoints `/semilla/*`.
 */
import type { Response } from 'express';
import { obtenerContexto, type SolicitudAutenticada } from '../modulo_autenticacion/middlewareAutenticacion';
import type { ServicioEvidencias } from './servicioEvidencias';
import type { ServicioIncidentes } from './servicioIncidentes';
import { aResumen } from './shared/tiposIncidentes';
import type {
  ActualizarTaxonomiaPayload,
  AgregarTaxonomiaPayload,
  CambiarEstadoPayload,
  ConsultaIncidentes,
  ConsultaValidacion,
  CrearIncidentePayload,
  GuardarEdicionPayload,
  ReporteEnviadoPayload,
  SubirEvidenciaPayload
} from './validacionesIncidentes';

export function crearControladorIncidentes(servicios: { incidentes: ServicioIncidentes; evidencias: ServicioEvidencias }) {
  const { incidentes, evidencias } = servicios;

  async function listar(req: SolicitudAutenticada, res: Response) {
    const consulta: ConsultaIncidentes = res.locals.consulta ?? {};
    const lista = await incidentes.listar(obtenerContexto(req), consulta);
    res.json({ incidentes: lista.map(aResumen), total: lista.length });
  }

  async function crear(req: SolicitudAutenticada, res: Response) {
    const datos: CrearIncidentePayload = req.body;
    const incidente = await incidentes.crear(obtenerContexto(req), datos);
    res.status(201).json({ incidente: aResumen(incidente) });
  }

  async function obtener(req: SolicitudAutenticada, res: Response) {
    const incidente = await incidentes.obtener(obtenerContexto(req), String(req.params.incidenteId));
    res.json({ incidente: aResumen(incidente) });
  }

  async function eliminar(req: SolicitudAutenticada, res: Response) {
    await incidentes.eliminar(obtenerContexto(req), String(req.params.incidenteId));
    res.status(204).end();
  }

  async function cambiarEstado(req: SolicitudAutenticada, res: Response) {
    const { estado }: CambiarEstadoPayload = req.body;
    const incidente = await incidentes.cambiarEstado(obtenerContexto(req), String(req.params.incidenteId), estado);
    res.json({ incidente: aResumen(incidente) });
  }

  async function historial(req: SolicitudAutenticada, res: Response) {
    const eventos = await incidentes.historial(obtenerContexto(req), String(req.params.incidenteId));
    res.json({ eventos });
  }

  // Semilla

  async function semillaBase(req: SolicitudAutenticada, res: Response) {
    res.json(await incidentes.semillaBase(obtenerContexto(req), String(req.params.incidenteId)));
  }

  async function semillaOriginal(req: SolicitudAutenticada, res: Response) {
    res.json(await incidentes.semillaOriginal(obtenerContexto(req), String(req.params.incidenteId)));
  }

  async function cargarEdicion(req: SolicitudAutenticada, res: Response) {
    const semilla = await incidentes.cargarEdicion(obtenerContexto(req), String(req.params.incidenteId));
    res.json({ semilla });
  }

  async function guardarEdicion(req: SolicitudAutenticada, res: Response) {
    const datos: GuardarEdicionPayload = req.body;
    const incidente = await incidentes.guardarEdicion(obtenerContexto(req), String(req.params.incidenteId), datos);
    res.json({ incidente: aResumen(incidente), semilla: incidente.semillaBase });
  }

  async function descartarEdicion(req: SolicitudAutenticada, res: Response) {
    res.json(await incidentes.descartarEdicion(obtenerContexto(req), String(req.params.incidenteId)));
  }

  async function restaurarOriginal(req: SolicitudAutenticada, res: Response) {
    const incidente = await incidentes.restaurarOriginal(obtenerContexto(req), String(req.params.incidenteId));
    res.json({ incidente: aResumen(incidente), semilla: incidente.semillaBase });
  }

  // Taxonomias

  async function listarTaxonomias(req: SolicitudAutenticada, res: Response) {
    res.json(await incidentes.resumenTaxonomias(obtenerContexto(req), String(req.params.incidenteId)));
  }

  async function agregarTaxonomia(req: SolicitudAutenticada, res: Response) {
    const datos: AgregarTaxonomiaPayload = req.body;
    const resultado = await incidentes.agregarTaxonomia(obtenerContexto(req), String(req.params.incidenteId), datos);
    res.status(201).json({ taxonomia: resultado.taxonomia, versionSemilla: resultado.incidente.semillaBase.metadatos.version });
  }

  async function actualizarTaxonomia(req: SolicitudAutenticada, res: Response) {
    const cambios: ActualizarTaxonomiaPayload = req.body;
    const resultado = await incidentes.actualizarTaxonomia(
      obtenerContexto(req),
      String(req.params.incidenteId),
      String(req.params.idUnico),
      cambios
    );
    res.json({ taxonomia: resultado.taxonomia, versionSemilla: resultado.incidente.semillaBase.metadatos.version });
  }

  async function eliminarTaxonomia(req: SolicitudAutenticada, res: Response) {
    await incidentes.eliminarTaxonomia(obtenerContexto(req), String(req.params.incidenteId), String(req.params.idUnico));
    res.status(204).end();
  }

  // Evidencias

  async function subirEvidencia(req: SolicitudAutenticada, res: Response) {
    const datos: SubirEvidenciaPayload = req.body;
    const archivo = req.file
      ? { nombreOriginal: req.file.originalname, tipoMime: req.file.mimetype, contenido: req.file.buffer }
      : undefined;
    const evidencia = await evidencias.subir(obtenerContexto(req), String(req.params.incidenteId), archivo, datos);
    res.status(201).json({ evidencia });
  }

  async function listarEvidencias(req: SolicitudAutenticada, res: Response) {
    const incluirEliminadas = String(req.query.incluirEliminadas ?? '') === 'true';
    const lista = await evidencias.listar(obtenerContexto(req), String(req.params.incidenteId), incluirEliminadas);
    res.json({ evidencias: lista, total: lista.length });
  }

  async function descargarEvidencia(req: SolicitudAutenticada, res: Response) {
    const { evidencia, contenido } = await evidencias.descargar(
      obtenerContexto(req),
      String(req.params.incidenteId),
      String(req.params.archivoId)
    );
    res.setHeader('Content-Type', evidencia.tipoMime);
    res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(evidencia.nombreOriginal)}"`);
    res.send(contenido);
  }

  async function eliminarEvidencia(req: SolicitudAutenticada, res: Response) {
    await evidencias.eliminar(obtenerContexto(req), String(req.params.incidenteId), String(req.params.archivoId));
    res.status(204).end();
  }

  // Cumplimiento ANCI

  async function plazos(req: SolicitudAutenticada, res: Response) {
    res.json(await incidentes.plazos(obtenerContexto(req), String(req.params.incidenteId)));
  }

  async function registrarReporteEnviado(req: SolicitudAutenticada, res: Response) {
    const datos: ReporteEnviadoPayload = req.body;
    const incidente = await incidentes.registrarReporteEnviado(obtenerContexto(req), String(req.params.incidenteId), datos);
    res.status(201).json({ reportesEnviados: incidente.reportesEnviados });
  }

  async function validarAnci(req: SolicitudAutenticada, res: Response) {
    const { tipoInforme }: ConsultaValidacion = res.locals.consulta;
    res.json(await incidentes.validarAnci(obtenerContexto(req), String(req.params.incidenteId), tipoInforme));
  }

  return {
    listar,
    crear,
    obtener,
    eliminar,
    cambiarEstado,
    historial,
    semillaBase,
    semillaOriginal,
    cargarEdicion,
    guardarEdicion,
    descartarEdicion,
    restaurarOriginal,
    listarTaxonomias,
    agregarTaxonomia,
    actualizarTaxonomia,
    eliminarTaxonomia,
    subirEvidencia,
    listarEvidencias,
    descargarEvidencia,
    eliminarEvidencia,
    plazos,
    registrarReporteEnviado,
    validarAnci
  };
}
