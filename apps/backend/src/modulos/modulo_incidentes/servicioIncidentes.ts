/**
 * Ciclo de vida de incidentes y de su semilla.
 *
 * Contrato:
 * - La semilla original se escribe una sola vez al crear.
 * - Toda modificacion de la semilla incrementa la version y condiciona la
 *   escritura a la version leida (409 si otro la cambio antes).
 * - Los reportes enviados se agregan con una escritura atomica por tipo.
 * - Los campos denormalizados del incidente se derivan siempre de la base.
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Reloj } from '../../compartido/tipos/reloj';
import { configuracion } from '../../configuracion';
import { log } from '../../infraestructura/logging/logger';
import { tieneAlcanceGlobal } from '../../infraestructura/seguridad/rbac';
import { asegurarAccesoEmpresa, type ContextoUsuario } from '../modulo_autenticacion/middlewareAutenticacion';
import { obtenerEmpresaAccesible } from '../modulo_empresas/servicioEmpresas';
import type { Empresa, RepositorioEmpresas } from '../modulo_empresas/shared/tiposEmpresas';
import { obtenerTaxonomia, taxonomiaAplica } from '../modulo_taxonomias/domain/catalogoTaxonomias';
import { construirIndiceUnico } from './domain/indiceUnico';
import { cuentaRegresiva, informeAplica, NOMBRES_INFORME, type CuentaRegresiva, type TipoInforme } from './domain/plazos';
import {
  actualizarTaxonomia,
  agregarTaxonomia,
  aplicarCambios,
  asignarIncidenteId,
  copiaBase,
  crearSemillaInicial,
  eliminarTaxonomia,
  marcarEdicion,
  prepararParaGuardar,
  restaurarOriginal,
  resumenTaxonomias,
  validarEstructura,
  verificarIntegridad,
  type ResumenTaxonomias
} from './domain/semilla';
import type { CambiosSemilla, SemillaIncidente, TaxonomiaSeleccionada } from './domain/tiposSemilla';
import { validarCamposAnci, type ResultadoValidacionAnci } from './domain/validacionAnci';
import type {
  AccionEvento,
  CambiosConReporte,
  CambiosIncidente,
  CondicionActualizacion,
  EstadoIncidente,
  EventoIncidente,
  Incidente,
  ReporteEnviado,
  RepositorioEventosIncidente,
  RepositorioIncidentes
} from './shared/tiposIncidentes';
import type {
  ActualizarTaxonomiaPayload,
  AgregarTaxonomiaPayload,
  ConsultaIncidentes,
  CrearIncidentePayload,
  GuardarEdicionPayload,
  ReporteEnviadoPayload
} from './validacionesIncidentes';

export type DependenciasIncidentes = {
  empresas: RepositorioEmpresas;
  incidentes: RepositorioIncidentes;
  eventos: RepositorioEventosIncidente;
  reloj: Reloj;
};

export type VistaSemilla = {
  semilla: SemillaIncidente;
  integridadOk: boolean;
};

/** Campos del incidente que replican datos de la semilla base. */
export function camposDenormalizados(semilla: SemillaIncidente): CambiosConReporte {
  return {
    titulo: semilla.identificacion.titulo,
    criticidad: semilla.identificacion.criticidad,
    fechaDeteccion: new Date(semilla.identificacion.fechaDeteccion),
    servicioEsencialAfectado: semilla.identificacion.servicioEsencialAfectado
  };
}

function reporteYaRegistrado(tipoInforme: TipoInforme): ErrorAplicacion {
  return new ErrorAplicacion('REPORTE_YA_REGISTRADO', `${NOMBRES_INFORME[tipoInforme]} ya fue registrado como enviado`, 409);
}

function conflictoVersion(): ErrorAplicacion {
  return new ErrorAplicacion(
    'CONFLICTO_VERSION',
    'La semilla fue modificada por otra operacion; recarga el incidente e intenta de nuevo',
    409
  );
}

export class ServicioIncidentes {
  constructor(private readonly deps: DependenciasIncidentes) {}

  get reloj(): Reloj {
    return this.deps.reloj;
  }

  async registrarEvento(incidente: Incidente, accion: AccionEvento, usuarioId: string, detalles: Record<string, unknown> = {}) {
    await this.deps.eventos.registrar({
      incidenteId: incidente.id,
      empresaId: incidente.empresaId,
      accion,
      usuarioId,
      detalles,
      creadoEn: this.deps.reloj.now()
    });
  }

  async crear(contexto: ContextoUsuario, datos: CrearIncidentePayload): Promise<Incidente> {
    const empresa = await obtenerEmpresaAccesible(this.deps.empresas, contexto, datos.empresaId);
    if (!empresa.activa) {
      throw new ErrorAplicacion('EMPRESA_INACTIVA', 'La empresa esta desactivada', 422);
    }

    const ahora = this.deps.reloj.now();
    const cambios: CambiosSemilla = {
      ...datos.semilla,
      identificacion: {
        ...datos.semilla.identificacion,
        titulo: datos.titulo,
        descripcion: datos.descripcion,
        fechaDeteccion: new Date(datos.fechaDeteccion).toISOString(),
        fechaOcurrencia: datos.fechaOcurrencia ? new Date(datos.fechaOcurrencia).toISOString() : null,
        criticidad: datos.criticidad ?? datos.semilla.identificacion?.criticidad ?? '',
        servicioEsencialAfectado: datos.servicioEsencialAfectado
      }
    };

    const correlativo = await this.deps.incidentes.siguienteCorrelativo();
    const indiceUnico = construirIndiceUnico(correlativo, empresa.rut, datos.titulo);
    const original = crearSemillaInicial({
      indiceUnico,
      empresaId: empresa.id,
      incidenteId: null,
      usuario: contexto.usuarioId,
      ahora,
      empresa: {
        razonSocial: empresa.razonSocial,
        rut: empresa.rut,
        tipoEmpresa: empresa.tipoEmpresa,
        sectorEsencial: empresa.sectorEsencial
      },
      cambios
    });

    const errores = validarEstructura(original);
    if (errores.length) {
      throw new ErrorAplicacion('SEMILLA_INVALIDA', 'La semilla del incidente esta incompleta', 422, errores);
    }

    const creado = await this.deps.incidentes.crear({
      indiceUnico,
      empresaId: empresa.id,
      titulo: original.identificacion.titulo,
      criticidad: original.identificacion.criticidad,
      estado: 'abierto',
      fechaDeteccion: new Date(original.identificacion.fechaDeteccion),
      servicioEsencialAfectado: original.identificacion.servicioEsencialAfectado,
      semillaOriginal: original,
      semillaBase: copiaBase(original),
      semillaEdicion: null,
      reportesEnviados: [],
      activo: true,
      eliminadoEn: null,
      creadoPor: contexto.usuarioId
    });

    // El id solo existe despues del insert; se estampa en ambas semillas.
    const conId = asignarIncidenteId(original, creado.id);
    const incidente = await this.deps.incidentes.actualizar(creado.id, {
      semillaOriginal: conId,
      semillaBase: copiaBase(conId)
    });
    if (!incidente) throw conflictoVersion();

    await this.registrarEvento(incidente, 'incidente_creado', contexto.usuarioId, { indiceUnico });
    log('info', 'Incidente creado', { incidenteId: incidente.id, indiceUnico, empresaId: empresa.id });
    return incidente;
  }

  async listar(contexto: ContextoUsuario, consulta: ConsultaIncidentes): Promise<Incidente[]> {
    let empresaIds: string[] | undefined;
    if (consulta.empresaId) {
      asegurarAccesoEmpresa(contexto, consulta.empresaId);
      empresaIds = [consulta.empresaId];
    } else if (!tieneAlcanceGlobal(contexto.roles)) {
      empresaIds = contexto.empresas;
    }
    return this.deps.incidentes.listar({ empresaIds, estado: consulta.estado });
  }

  /** Incidente activo y visible para el usuario; 404 en otro caso. */
  async obtener(contexto: ContextoUsuario, incidenteId: string): Promise<Incidente> {
    const incidente = await this.deps.incidentes.buscarPorId(incidenteId);
    if (!incidente || !incidente.activo) {
      throw new ErrorAplicacion('INCIDENTE_NO_ENCONTRADO', 'Incidente no encontrado', 404);
    }
    asegurarAccesoEmpresa(contexto, incidente.empresaId);
    return incidente;
  }

  async obtenerConEmpresa(contexto: ContextoUsuario, incidenteId: string): Promise<{ incidente: Incidente; empresa: Empresa }> {
    const incidente = await this.obtener(contexto, incidenteId);
    const empresa = await obtenerEmpresaAccesible(this.deps.empresas, contexto, incidente.empresaId);
    return { incidente, empresa };
  }

  /**
   * Persiste una nueva semilla base (version + 1) y sincroniza los campos
   * denormalizados. Descarta la edicion en curso cuando `descartarEdicion`.
   */
  async guardarBase(
    incidente: Incidente,
    semilla: SemillaIncidente,
    usuarioId: string,
    opciones: { descartarEdicion?: boolean } = {}
  ): Promise<Incidente> {
    const cambios: CambiosIncidente = this.cambiosBase(semilla, usuarioId);
    if (opciones.descartarEdicion) cambios.semillaEdicion = null;

    const actualizado = await this.deps.incidentes.actualizar(incidente.id, cambios, {
      versionBase: incidente.semillaBase.metadatos.version
    });
    if (!actualizado) throw conflictoVersion();
    return actualizado;
  }

  private cambiosBase(semilla: SemillaIncidente, usuarioId: string): CambiosConReporte {
    const guardada = prepararParaGuardar(semilla, usuarioId, this.deps.reloj.now());
    return { ...camposDenormalizados(guardada), semillaBase: guardada };
  }

  async eliminar(contexto: ContextoUsuario, incidenteId: string): Promise<Incidente> {
    const incidente = await this.obtener(contexto, incidenteId);
    const eliminado = await this.deps.incidentes.actualizar(incidente.id, {
      activo: false,
      eliminadoEn: this.deps.reloj.now()
    });
    if (!eliminado) throw new ErrorAplicacion('INCIDENTE_NO_ENCONTRADO', 'Incidente no encontrado', 404);
    await this.registrarEvento(incidente, 'incidente_eliminado', contexto.usuarioId);
    return eliminado;
  }

  async cambiarEstado(contexto: ContextoUsuario, incidenteId: string, estado: EstadoIncidente): Promise<Incidente> {
    const incidente = await this.obtener(contexto, incidenteId);
    if (incidente.estado === estado) return incidente;
    const actualizado = await this.deps.incidentes.actualizar(incidente.id, { estado });
    if (!actualizado) throw new ErrorAplicacion('INCIDENTE_NO_ENCONTRADO', 'Incidente no encontrado', 404);
    await this.registrarEvento(incidente, 'estado_cambiado', contexto.usuarioId, { anterior: incidente.estado, nuevo: estado });
    return actualizado;
  }

  // -------------------------------------------------------------------------
  // Semilla
  // -------------------------------------------------------------------------

  async semillaBase(contexto: ContextoUsuario, incidenteId: string): Promise<VistaSemilla> {
    const { semillaBase } = await this.obtener(contexto, incidenteId);
    return { semilla: semillaBase, integridadOk: verificarIntegridad(semillaBase) };
  }

  async semillaOriginal(contexto: ContextoUsuario, incidenteId: string): Promise<VistaSemilla> {
    const { semillaOriginal } = await this.obtener(contexto, incidenteId);
    return { semilla: semillaOriginal, integridadOk: verificarIntegridad(semillaOriginal) };
  }

  /**
   * Devuelve la edicion en curso o abre una nueva a partir de la base. Una
   * edicion abierta sobre una version anterior de la base (taxonomias,
   * evidencias o reportes guardados despues) se reemplaza.
   */
  async cargarEdicion(contexto: ContextoUsuario, incidenteId: string): Promise<SemillaIncidente> {
    const incidente = await this.obtener(contexto, incidenteId);
    const { semillaEdicion } = incidente;
    if (semillaEdicion && semillaEdicion.metadatos.version === incidente.semillaBase.metadatos.version) {
      return semillaEdicion;
    }

    const edicion = marcarEdicion(incidente.semillaBase, contexto.usuarioId, this.deps.reloj.now());
    const actualizado = await this.deps.incidentes.actualizar(
      incidente.id,
      { semillaEdicion: edicion },
      { versionBase: incidente.semillaBase.metadatos.version }
    );
    if (!actualizado) throw conflictoVersion();
    await this.registrarEvento(incidente, 'edicion_iniciada', contexto.usuarioId, { version: edicion.metadatos.version });
    return edicion;
  }

  async guardarEdicion(contexto: ContextoUsuario, incidenteId: string, datos: GuardarEdicionPayload): Promise<Incidente> {
    const incidente = await this.obtener(contexto, incidenteId);
    const versionActual = incidente.semillaBase.metadatos.version;
    if (datos.versionEsperada !== undefined && datos.versionEsperada !== versionActual) {
      throw conflictoVersion();
    }

    // Los cambios se aplican sobre la base vigente: taxonomias y evidencias
    // agregadas mientras habia una edicion abierta no se pierden.
    const nueva = aplicarCambios(incidente.semillaBase, datos.cambios);
    const errores = validarEstructura(nueva);
    if (errores.length) {
      throw new ErrorAplicacion('SEMILLA_INVALIDA', 'La semilla resultante esta incompleta', 422, errores);
    }

    const actualizado = await this.guardarBase(incidente, nueva, contexto.usuarioId, { descartarEdicion: true });
    await this.registrarEvento(incidente, 'edicion_guardada', contexto.usuarioId, {
      versionAnterior: versionActual,
      version: actualizado.semillaBase.metadatos.version,
      secciones: Object.keys(datos.cambios)
    });
    return actualizado;
  }

  async descartarEdicion(contexto: ContextoUsuario, incidenteId: string): Promise<{ descartada: boolean }> {
    const incidente = await this.obtener(contexto, incidenteId);
    if (!incidente.semillaEdicion) return { descartada: false };
    await this.deps.incidentes.actualizar(incidente.id, { semillaEdicion: null });
    await this.registrarEvento(incidente, 'edicion_descartada', contexto.usuarioId);
    return { descartada: true };
  }

  async restaurarOriginal(contexto: ContextoUsuario, incidenteId: string): Promise<Incidente> {
    const incidente = await this.obtener(contexto, incidenteId);
    const ahora = this.deps.reloj.now();
    // `restaurarOriginal` ya deja la version en actual + 1.
    const restaurada = restaurarOriginal(incidente.semillaOriginal, incidente.semillaBase, contexto.usuarioId, ahora);
    const actualizado = await this.deps.incidentes.actualizar(
      incidente.id,
      { ...camposDenormalizados(restaurada), semillaBase: restaurada, semillaEdicion: null },
      { versionBase: incidente.semillaBase.metadatos.version }
    );
    if (!actualizado) throw conflictoVersion();
    await this.registrarEvento(incidente, 'original_restaurada', contexto.usuarioId, {
      version: restaurada.metadatos.version
    });
    return actualizado;
  }

  // -------------------------------------------------------------------------
  // Taxonomias
  // -------------------------------------------------------------------------

  async resumenTaxonomias(contexto: ContextoUsuario, incidenteId: string): Promise<ResumenTaxonomias> {
    const incidente = await this.obtener(contexto, incidenteId);
    return resumenTaxonomias(incidente.semillaBase);
  }

  async agregarTaxonomia(
    contexto: ContextoUsuario,
    incidenteId: string,
    datos: AgregarTaxonomiaPayload
  ): Promise<{ incidente: Incidente; taxonomia: TaxonomiaSeleccionada }> {
    const { incidente, empresa } = await this.obtenerConEmpresa(contexto, incidenteId);
    const catalogo = obtenerTaxonomia(datos.codigo);
    if (!catalogo) {
      throw new ErrorAplicacion('TAXONOMIA_NO_ENCONTRADA', `Taxonomia ${datos.codigo} no existe`, 404);
    }
    if (!taxonomiaAplica(catalogo, empresa.tipoEmpresa)) {
      throw new ErrorAplicacion(
        'TAXONOMIA_NO_APLICA',
        `La taxonomia ${datos.codigo} no aplica a empresas ${empresa.tipoEmpresa}`,
        422
      );
    }
    const resultado = agregarTaxonomia(incidente.semillaBase, datos, contexto.usuarioId, this.deps.reloj.now());
    const actualizado = await this.guardarBase(incidente, resultado.semilla, contexto.usuarioId);
    await this.registrarEvento(incidente, 'taxonomia_agregada', contexto.usuarioId, {
      codigo: datos.codigo,
      idUnico: resultado.taxonomia.idUnico
    });
    return { incidente: actualizado, taxonomia: resultado.taxonomia };
  }

  async actualizarTaxonomia(
    contexto: ContextoUsuario,
    incidenteId: string,
    idUnico: string,
    cambios: ActualizarTaxonomiaPayload
  ): Promise<{ incidente: Incidente; taxonomia: TaxonomiaSeleccionada }> {
    const incidente = await this.obtener(contexto, incidenteId);
    const resultado = actualizarTaxonomia(incidente.semillaBase, idUnico, cambios, contexto.usuarioId, this.deps.reloj.now());
    const actualizado = await this.guardarBase(incidente, resultado.semilla, contexto.usuarioId);
    await this.registrarEvento(incidente, 'taxonomia_actualizada', contexto.usuarioId, {
      codigo: resultado.taxonomia.codigo,
      idUnico
    });
    return { incidente: actualizado, taxonomia: resultado.taxonomia };
  }

  async eliminarTaxonomia(contexto: ContextoUsuario, incidenteId: string, idUnico: string): Promise<Incidente> {
    const incidente = await this.obtener(contexto, incidenteId);
    const semilla = eliminarTaxonomia(incidente.semillaBase, idUnico, contexto.usuarioId, this.deps.reloj.now());
    const actualizado = await this.guardarBase(incidente, semilla, contexto.usuarioId);
    await this.registrarEvento(incidente, 'taxonomia_eliminada', contexto.usuarioId, { idUnico });
    return actualizado;
  }

  // -------------------------------------------------------------------------
  // Cumplimiento ANCI
  // -------------------------------------------------------------------------

  async validarAnci(contexto: ContextoUsuario, incidenteId: string, tipoInforme: TipoInforme): Promise<ResultadoValidacionAnci> {
    const incidente = await this.obtener(contexto, incidenteId);
    return validarCamposAnci(incidente.semillaBase, tipoInforme);
  }

  cuentaRegresiva(incidente: Incidente, empresa: Empresa): CuentaRegresiva {
    const enviados: Partial<Record<TipoInforme, Date>> = {};
    for (const reporte of incidente.reportesEnviados) enviados[reporte.tipoInforme] = reporte.enviadoEn;
    return cuentaRegresiva(
      {
        tipoEmpresa: empresa.tipoEmpresa,
        servicioEsencialAfectado: incidente.servicioEsencialAfectado,
        fechaDeteccion: incidente.fechaDeteccion
      },
      this.deps.reloj.now(),
      enviados,
      { diasInformeFinal: configuracion.plazoInformeFinalDias, umbralPorVencer: configuracion.umbralPorVencer }
    );
  }

  async plazos(contexto: ContextoUsuario, incidenteId: string): Promise<CuentaRegresiva> {
    const { incidente, empresa } = await this.obtenerConEmpresa(contexto, incidenteId);
    return this.cuentaRegresiva(incidente, empresa);
  }

  async registrarReporteEnviado(contexto: ContextoUsuario, incidenteId: string, datos: ReporteEnviadoPayload): Promise<Incidente> {
    const { incidente, empresa } = await this.obtenerConEmpresa(contexto, incidenteId);
    if (!informeAplica(datos.tipoInforme, empresa.tipoEmpresa)) {
      throw new ErrorAplicacion(
        'INFORME_NO_APLICA',
        `${NOMBRES_INFORME[datos.tipoInforme]} solo aplica a empresas OIV`,
        422
      );
    }
    if (incidente.reportesEnviados.some((r) => r.tipoInforme === datos.tipoInforme)) {
      throw reporteYaRegistrado(datos.tipoInforme);
    }

    const ahora = this.deps.reloj.now();
    const enviadoEn = datos.enviadoEn ? new Date(datos.enviadoEn) : ahora;
    const reporte: ReporteEnviado = {
      tipoInforme: datos.tipoInforme,
      enviadoEn,
      folioAnci: datos.folioAnci ?? '',
      registradoPor: contexto.usuarioId,
      registradoEn: ahora
    };

    let cambios: CambiosConReporte = {};
    let condicion: CondicionActualizacion = {};
    if (datos.folioAnci && !incidente.semillaBase.anci.folioAnci) {
      // El primer folio entregado por la ANCI queda tambien en la seccion 9.
      const semilla = aplicarCambios(incidente.semillaBase, {
        anci: { folioAnci: datos.folioAnci, fechaDeclaracion: enviadoEn.toISOString() }
      });
      cambios = this.cambiosBase(semilla, contexto.usuarioId);
      condicion = { versionBase: incidente.semillaBase.metadatos.version };
    }

    const actualizado = await this.deps.incidentes.agregarReporteEnviado(incidente.id, reporte, cambios, condicion);
    if (!actualizado) throw await this.rechazoReporte(incidente.id, datos.tipoInforme);

    await this.registrarEvento(incidente, 'reporte_enviado', contexto.usuarioId, {
      tipoInforme: datos.tipoInforme,
      enviadoEn: enviadoEn.toISOString(),
      folioAnci: datos.folioAnci ?? ''
    });
    return actualizado;
  }

  /** Motivo por el que no se agrego un reporte: otro lo registro antes o cambio la base. */
  private async rechazoReporte(incidenteId: string, tipoInforme: TipoInforme): Promise<ErrorAplicacion> {
    const vigente = await this.deps.incidentes.buscarPorId(incidenteId);
    if (!vigente || !vigente.activo) {
      return new ErrorAplicacion('INCIDENTE_NO_ENCONTRADO', 'Incidente no encontrado', 404);
    }
    if (vigente.reportesEnviados.some((r) => r.tipoInforme === tipoInforme)) {
      return reporteYaRegistrado(tipoInforme);
    }
    return conflictoVersion();
  }

  async historial(contexto: ContextoUsuario, incidenteId: string): Promise<EventoIncidente[]> {
    const incidente = await this.obtener(contexto, incidenteId);
    return this.deps.eventos.listarPorIncidente(incidente.id);
  }
}
