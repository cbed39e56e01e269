/**
 * Acceso a empresas respetando el alcance del usuario.
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { asegurarAccesoEmpresa, type ContextoUsuario } from '../modulo_autenticacion/middlewareAutenticacion';
import type { Empresa, RepositorioEmpresas } from './shared/tiposEmpresas';

export async function obtenerEmpresaAccesible(
  empresas: RepositorioEmpresas,
  contexto: ContextoUsuario,
  empresaId: string
): Promise<Empresa> {
  const empresa = await empresas.buscarPorId(empresaId);
  if (!empresa) {
    throw new ErrorAplicacion('EMPRESA_NO_ENCONTRADA', 'Empresa no encontrada', 404);
  }
  asegurarAccesoEmpresa(contexto, empresa.id);
  return empresa;
}
