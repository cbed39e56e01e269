/**
 * Modelo de auditoria de incidentes.
 */
import { Schema, model, models, type Model } from 'mongoose';
import { ACCIONES_EVENTO, type AccionEvento } from './shared/tiposIncidentes';

export type DocEventoIncidente = {
  incidenteId: string;
  empresaId: string;
  accion: AccionEvento;
  usuarioId: string;
  detalles: Record<string, unknown>;
  creadoEn: Date;
};

const EventoIncidenteSchema = new Schema<DocEventoIncidente>(
  {
    incidenteId: { type: String, required: true },
    empresaId: { type: String, required: true },
    accion: { type: String, enum: ACCIONES_EVENTO, required: true },
    usuarioId: { type: String, required: true },
    detalles: { type: Schema.Types.Mixed, default: {} },
    creadoEn: { type: Date, required: true }
  },
  { collection: 'eventos_incidente', minimize: false }
);

EventoIncidenteSchema.index({ incidenteId: 1, creadoEn: 1 });

export const EventoIncidente: Model<DocEventoIncidente> =
  models.EventoIncidente ?? model<DocEventoIncidente>('EventoIncidente', EventoIncidenteSchema);
