/**
 * Controlador de informes ANCI.
 */
import type { Response } from 'express';
import { obtenerContexto, type SolicitudAutenticada } from '../modulo_autenticacion/middlewareAutenticacion';
import type { ServicioInformesAnci } from './servicioInformesAnci';
import type { ConsultaEmpresa, GenerarInformePayload } from './validacionesInformes';

const MIME_DOCX = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export function crearControladorInformesAnci(servicio: ServicioInformesAnci) {
  async function plantillas(req: SolicitudAutenticada, res: Response) {
    const { empresaId }: ConsultaEmpresa = res.locals.consulta ?? {};
    const lista = await servicio.plantillas(obtenerContexto(req), empresaId);
    res.json({ plantillas: lista });
  }

  async function generar(req: SolicitudAutenticada, res: Response) {
    const datos: GenerarInformePayload = req.body;
    const resultado = await servicio.generar(obtenerContexto(req), String(req.params.incidenteId), datos);
    if (resultado.formato === 'json') {
      res.json({ informe: resultado.informe, validacion: resultado.validacion });
      return;
    }
    res.status(201).json({ informe: resultado.registro, validacion: resultado.validacion });
  }

  async function historial(req: SolicitudAutenticada, res: Response) {
    const informes = await servicio.historial(obtenerContexto(req), String(req.params.incidenteId));
    res.json({ informes, total: informes.length });
  }

  async function descargar(req: SolicitudAutenticada, res: Response) {
    const { informe, contenido } = await servicio.descargar(obtenerContexto(req), String(req.params.informeId));
    res.setHeader('Content-Type', MIME_DOCX);
    res.setHeader('Content-Disposition', `attachment; filename="${informe.nombreArchivo}"`);
    res.send(contenido);
  }

  async function cuentaRegresiva(req: SolicitudAutenticada, res: Response) {
    const { empresaId }: ConsultaEmpresa = res.locals.consulta ?? {};
    const incidentes = await servicio.cuentaRegresivaGlobal(obtenerContexto(req), empresaId);
    res.json({ incidentes, total: incidentes.length });
  }

  return { plantillas, generar, historial, descargar, cuentaRegresiva };
}
