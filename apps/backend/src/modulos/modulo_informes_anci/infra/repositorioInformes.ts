/**
 * Repositorio Mongo del historial de informes.
 */
import type { Types } from 'mongoose';
import { InformeAnci as ModeloInforme, type DocInformeAnci } from '../modeloInformeAnci';
import type { InformeAnci, NuevoInformeAnci, RepositorioInformes } from '../shared/tiposInformes';

function aInforme(doc: DocInformeAnci & { _id: Types.ObjectId }): InformeAnci {
  return {
    id: String(doc._id),
    incidenteId: doc.incidenteId,
    empresaId: doc.empresaId,
    tipoInforme: doc.tipoInforme,
    nombreArchivo: doc.nombreArchivo,
    ruta: doc.ruta,
    tamanoBytes: doc.tamanoBytes,
    hashSha256: doc.hashSha256,
    versionSemilla: doc.versionSemilla,
    usoPlantilla: doc.usoPlantilla,
    marcadoresDesconocidos: [...doc.marcadoresDesconocidos],
    generadoPor: doc.generadoPor,
    generadoEn: doc.generadoEn
  };
}

export class MongoRepositorioInformes implements RepositorioInformes {
  async registrar(informe: NuevoInformeAnci): Promise<InformeAnci> {
    const doc = await ModeloInforme.create(informe);
    return aInforme(doc.toObject());
  }

  async buscarPorId(id: string): Promise<InformeAnci | null> {
    const doc = await ModeloInforme.findById(id).exec();
    return doc ? aInforme(doc.toObject()) : null;
  }

  async listarPorIncidente(incidenteId: string): Promise<InformeAnci[]> {
    const docs = await ModeloInforme.find({ incidenteId }).sort({ generadoEn: -1 }).exec();
    return docs.map((doc) => aInforme(doc.toObject()));
  }
}
