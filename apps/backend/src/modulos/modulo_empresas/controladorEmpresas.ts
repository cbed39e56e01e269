/**
 * Controlador de empresas.
 *
 * Contrato:
 * - `admin` y `analista` ven todas las empresas; el resto solo las de su token.
 * - DELETE es desactivacion logica (`activa = false`).
 */
import type { Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { tieneAlcanceGlobal } from '../../infraestructura/seguridad/rbac';
import { obtenerContexto, type SolicitudAutenticada } from '../modulo_autenticacion/middlewareAutenticacion';
import { seccionesParaEmpresa } from '../modulo_taxonomias/domain/seccionesAnci';
import { obtenerEmpresaAccesible } from './servicioEmpresas';
import type { RepositorioEmpresas } from './shared/tiposEmpresas';
import type { ActualizarEmpresaPayload, CrearEmpresaPayload } from './validacionesEmpresas';

export function crearControladorEmpresas(deps: { empresas: RepositorioEmpresas }) {
  async function listar(req: SolicitudAutenticada, res: Response) {
    const contexto = obtenerContexto(req);
    const global = tieneAlcanceGlobal(contexto.roles);
    const empresas = await deps.empresas.listar({
      ids: global ? undefined : contexto.empresas,
      incluirInactivas: global && String(req.query.incluirInactivas ?? '') === 'true'
    });
    res.json({ empresas });
  }

  async function crear(req: SolicitudAutenticada, res: Response) {
    const datos: CrearEmpresaPayload = req.body;
    const existente = await deps.empresas.buscarPorRut(datos.rut);
    if (existente) {
      throw new ErrorAplicacion('EMPRESA_DUPLICADA', `Ya existe una empresa con RUT ${datos.rut}`, 409);
    }
    const empresa = await deps.empresas.crear(datos);
    res.status(201).json({ empresa });
  }

  async function obtener(req: SolicitudAutenticada, res: Response) {
    const empresa = await obtenerEmpresaAccesible(deps.empresas, obtenerContexto(req), String(req.params.empresaId));
    res.json({ empresa });
  }

  async function actualizar(req: SolicitudAutenticada, res: Response) {
    const actual = await obtenerEmpresaAccesible(deps.empresas, obtenerContexto(req), String(req.params.empresaId));
    const cambios: ActualizarEmpresaPayload = req.body;
    const empresa = await deps.empresas.actualizar(actual.id, cambios);
    res.json({ empresa });
  }

  async function desactivar(req: SolicitudAutenticada, res: Response) {
    const actual = await obtenerEmpresaAccesible(deps.empresas, obtenerContexto(req), String(req.params.empresaId));
    const empresa = await deps.empresas.actualizar(actual.id, { activa: false });
    res.json({ empresa });
  }

  async function secciones(req: SolicitudAutenticada, res: Response) {
    const empresa = await obtenerEmpresaAccesible(deps.empresas, obtenerContexto(req), String(req.params.empresaId));
    res.json({ empresaId: empresa.id, tipoEmpresa: empresa.tipoEmpresa, secciones: seccionesParaEmpresa(empresa.tipoEmpresa) });
  }

  return { listar, crear, obtener, actualizar, desactivar, secciones };
}
