/**
 * Tipos internos del modulo de autenticacion.
 */
export type Usuario = {
  id: string;
  correo: string;
  nombre: string;
  hashContrasena: string;
  roles: string[];
  empresas: string[];
  activo: boolean;
  ultimoAcceso: Date | null;
  creadoEn: Date;
};

export type NuevoUsuario = Omit<Usuario, 'id' | 'ultimoAcceso' | 'creadoEn'>;

export type CambiosUsuario = Partial<Pick<Usuario, 'nombre' | 'hashContrasena' | 'roles' | 'empresas' | 'activo' | 'ultimoAcceso'>>;

export interface RepositorioUsuarios {
  buscarPorId(id: string): Promise<Usuario | null>;
  buscarPorCorreo(correo: string): Promise<Usuario | null>;
  crear(datos: NuevoUsuario): Promise<Usuario>;
  actualizar(id: string, cambios: CambiosUsuario): Promise<Usuario | null>;
}

/** Vista publica: nunca expone el hash. */
export type UsuarioPublico = Omit<Usuario, 'hashContrasena'>;

export function aUsuarioPublico(usuario: Usuario): UsuarioPublico {
  const { hashContrasena: _hash, ...resto } = usuario;
  return resto;
}
