/**
 * Repositorio Mongo de usuarios.
 */
import type { Types } from 'mongoose';
import { Usuario as ModeloUsuario, type DocUsuario } from '../modeloUsuario';
import type { CambiosUsuario, NuevoUsuario, RepositorioUsuarios, Usuario } from '../shared/tiposAutenticacion';

function aUsuario(doc: DocUsuario & { _id: Types.ObjectId }): Usuario {
  return {
    id: String(doc._id),
    correo: doc.correo,
    nombre: doc.nombre,
    hashContrasena: doc.hashContrasena,
    roles: [...doc.roles],
    empresas: [...doc.empresas],
    activo: doc.activo,
    ultimoAcceso: doc.ultimoAcceso ?? null,
    creadoEn: doc.createdAt
  };
}

export class MongoRepositorioUsuarios implements RepositorioUsuarios {
  async buscarPorId(id: string): Promise<Usuario | null> {
    const doc = await ModeloUsuario.findById(id).exec();
    return doc ? aUsuario(doc.toObject()) : null;
  }

  async buscarPorCorreo(correo: string): Promise<Usuario | null> {
    const doc = await ModeloUsuario.findOne({ correo: correo.trim().toLowerCase() }).exec();
    return doc ? aUsuario(doc.toObject()) : null;
  }

  async crear(datos: NuevoUsuario): Promise<Usuario> {
    const doc = await ModeloUsuario.create(datos);
    return aUsuario(doc.toObject());
  }

  async actualizar(id: string, cambios: CambiosUsuario): Promise<Usuario | null> {
    const doc = await ModeloUsuario.findByIdAndUpdate(id, { $set: cambios }, { new: true }).exec();
    return doc ? aUsuario(doc.toObject()) : null;
  }
}
