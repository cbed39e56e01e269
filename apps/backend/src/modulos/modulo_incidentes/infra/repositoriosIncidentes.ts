/**
 * Repositorios Mongo de incidentes y su auditoria.
 */
import type { Types, UpdateQuery } from 'mongoose';
import { CRITICIDADES, type Criticidad } from '../domain/tiposSemilla';
import { Contador, Incidente as ModeloIncidente, type DocIncidente } from '../modeloIncidente';
import { EventoIncidente as ModeloEvento, type DocEventoIncidente } from '../modeloEventoIncidente';
import type {
  CambiosConReporte,
  CambiosIncidente,
  CondicionActualizacion,
  EventoIncidente,
  FiltroIncidentes,
  Incidente,
  NuevoEvento,
  NuevoIncidente,
  ReporteEnviado,
  RepositorioEventosIncidente,
  RepositorioIncidentes
} from '../shared/tiposIncidentes';

function aCriticidad(valor: string): Criticidad | '' {
  return CRITICIDADES.find((c) => c === valor) ?? '';
}

function aIncidente(doc: DocIncidente & { _id: Types.ObjectId }): Incidente {
  return {
    id: String(doc._id),
    indiceUnico: doc.indiceUnico,
    empresaId: doc.empresaId,
    titulo: doc.titulo,
    criticidad: aCriticidad(doc.criticidad),
    estado: doc.estado,
    fechaDeteccion: doc.fechaDeteccion,
    servicioEsencialAfectado: doc.servicioEsencialAfectado,
    semillaOriginal: doc.semillaOriginal,
    semillaBase: doc.semillaBase,
    semillaEdicion: doc.semillaEdicion ?? null,
    reportesEnviados: doc.reportesEnviados.map((r) => ({ ...r })),
    activo: doc.activo,
    eliminadoEn: doc.eliminadoEn ?? null,
    creadoPor: doc.creadoPor,
    creadoEn: doc.createdAt,
    actualizadoEn: doc.updatedAt
  };
}

export class MongoRepositorioIncidentes implements RepositorioIncidentes {
  async siguienteCorrelativo(): Promise<number> {
    const contador = await Contador.findOneAndUpdate(
      { _id: 'incidentes' },
      { $inc: { valor: 1 } },
      { upsert: true, new: true }
    ).exec();
    if (!contador) throw new Error('No se pudo obtener el correlativo de incidentes');
    return contador.valor;
  }

  async crear(datos: NuevoIncidente): Promise<Incidente> {
    const doc = await ModeloIncidente.create(datos);
    return aIncidente(doc.toObject());
  }

  async buscarPorId(id: string): Promise<Incidente | null> {
    const doc = await ModeloIncidente.findById(id).exec();
    return doc ? aIncidente(doc.toObject()) : null;
  }

  async listar(filtro: FiltroIncidentes): Promise<Incidente[]> {
    const consulta: Record<string, unknown> = {};
    if (!filtro.incluirEliminados) consulta.activo = true;
    if (filtro.empresaIds) consulta.empresaId = { $in: filtro.empresaIds };
    if (filtro.estado) consulta.estado = filtro.estado;
    const docs = await ModeloIncidente.find(consulta).sort({ fechaDeteccion: -1 }).exec();
    return docs.map((doc) => aIncidente(doc.toObject()));
  }

  async actualizar(id: string, cambios: CambiosIncidente, condicion: CondicionActualizacion = {}): Promise<Incidente | null> {
    const filtro: Record<string, unknown> = { _id: id };
    if (condicion.versionBase !== undefined) filtro['semillaBase.metadatos.version'] = condicion.versionBase;
    const doc = await ModeloIncidente.findOneAndUpdate(filtro, { $set: cambios }, { new: true }).exec();
    return doc ? aIncidente(doc.toObject()) : null;
  }

  async agregarReporteEnviado(
    id: string,
    reporte: ReporteEnviado,
    cambios: CambiosConReporte = {},
    condicion: CondicionActualizacion = {}
  ): Promise<Incidente | null> {
    const filtro: Record<string, unknown> = { _id: id, 'reportesEnviados.tipoInforme': { $ne: reporte.tipoInforme } };
    if (condicion.versionBase !== undefined) filtro['semillaBase.metadatos.version'] = condicion.versionBase;
    const actualizacion: UpdateQuery<DocIncidente> = { $push: { reportesEnviados: reporte } };
    if (Object.keys(cambios).length) actualizacion.$set = cambios;
    const doc = await ModeloIncidente.findOneAndUpdate(filtro, actualizacion, { new: true }).exec();
    return doc ? aIncidente(doc.toObject()) : null;
  }
}

function aEvento(doc: DocEventoIncidente & { _id: Types.ObjectId }): EventoIncidente {
  return {
    id: String(doc._id),
    incidenteId: doc.incidenteId,
    empresaId: doc.empresaId,
    accion: doc.accion,
    usuarioId: doc.usuarioId,
    detalles: doc.detalles ?? {},
    creadoEn: doc.creadoEn
  };
}

export class MongoRepositorioEventos implements RepositorioEventosIncidente {
  async registrar(evento: NuevoEvento): Promise<EventoIncidente> {
    const doc = await ModeloEvento.create(evento);
    return aEvento(doc.toObject());
  }

  async listarPorIncidente(incidenteId: string): Promise<EventoIncidente[]> {
    const docs = await ModeloEvento.find({ incidenteId }).sort({ creadoEn: 1 }).exec();
    return docs.map((doc) => aEvento(doc.toObject()));
  }
}
