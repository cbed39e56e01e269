/**
 * Repositorio Mongo de empresas.
 */
import type { Types } from 'mongoose';
import { Empresa as ModeloEmpresa, type DocEmpresa } from '../modeloEmpresa';
import type { CambiosEmpresa, Empresa, FiltroEmpresas, NuevaEmpresa, RepositorioEmpresas } from '../shared/tiposEmpresas';

function aEmpresa(doc: DocEmpresa & { _id: Types.ObjectId }): Empresa {
  return {
    id: String(doc._id),
    razonSocial: doc.razonSocial,
    rut: doc.rut,
    tipoEmpresa: doc.tipoEmpresa,
    sectorEsencial: doc.sectorEsencial,
    correoContacto: doc.correoContacto,
    activa: doc.activa,
    creadoEn: doc.createdAt,
    actualizadoEn: doc.updatedAt
  };
}

export class MongoRepositorioEmpresas implements RepositorioEmpresas {
  async listar(filtro: FiltroEmpresas): Promise<Empresa[]> {
    const consulta: Record<string, unknown> = {};
    if (!filtro.incluirInactivas) consulta.activa = true;
    if (filtro.ids) consulta._id = { $in: filtro.ids };
    const docs = await ModeloEmpresa.find(consulta).sort({ razonSocial: 1 }).exec();
    return docs.map((doc) => aEmpresa(doc.toObject()));
  }

  async buscarPorId(id: string): Promise<Empresa | null> {
    const doc = await ModeloEmpresa.findById(id).exec();
    return doc ? aEmpresa(doc.toObject()) : null;
  }

  async buscarPorRut(rut: string): Promise<Empresa | null> {
    const doc = await ModeloEmpresa.findOne({ rut }).exec();
    return doc ? aEmpresa(doc.toObject()) : null;
  }

  async crear(datos: NuevaEmpresa): Promise<Empresa> {
    const doc = await ModeloEmpresa.create(datos);
    return aEmpresa(doc.toObject());
  }

  async actualizar(id: string, cambios: CambiosEmpresa): Promise<Empresa | null> {
    const doc = await ModeloEmpresa.findByIdAndUpdate(id, { $set: cambios }, { new: true, runValidators: true }).exec();
    return doc ? aEmpresa(doc.toObject()) : null;
  }
}
