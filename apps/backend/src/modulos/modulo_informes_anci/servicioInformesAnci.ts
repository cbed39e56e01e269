/**
 * Generacion y consulta de informes ANCI.
 *
 * Los informes se construyen siempre desde la semilla base vigente; el
 * registro guarda la version de semilla usada para poder auditarlo despues.
 */
import { createHash } from 'node:crypto';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { registrarInformeGenerado } from '../../compartido/observabilidad/metrics';
import { marcaTiempoArchivo } from '../../compartido/utilidades/fechas';
import { asegurarAccesoEmpresa, type ContextoUsuario } from '../modulo_autenticacion/middlewareAutenticacion';
import { carpetaIncidente, type AlmacenArchivos } from '../../infraestructura/archivos/almacenLocal';
import { log } from '../../infraestructura/logging/logger';
import { obtenerEmpresaAccesible } from '../modulo_empresas/servicioEmpresas';
import type { Empresa, RepositorioEmpresas } from '../modulo_empresas/shared/tiposEmpresas';
import { informeAplica, NOMBRES_INFORME, type CuentaRegresiva, type TipoInforme } from '../modulo_incidentes/domain/plazos';
import { validarCamposAnci, type ResultadoValidacionAnci } from '../modulo_incidentes/domain/validacionAnci';
import type { ServicioIncidentes } from '../modulo_incidentes/servicioIncidentes';
import type { EstadoIncidente, Incidente, RepositorioEventosIncidente } from '../modulo_incidentes/shared/tiposIncidentes';
import { construirInformeEstructurado, type ContextoInforme, type InformeEstructurado } from './domain/informeEstructurado';
import { construirMarcadores } from './domain/marcadores';
import { obtenerPlantilla, plantillasParaEmpresa, type PlantillaAnci } from './domain/plantillasAnci';
import { cargarPlantilla, construirDocumento, sustituirMarcadores } from './infra/generadorDocx';
import type { InformeAnci, RepositorioInformes } from './shared/tiposInformes';
import type { GenerarInformePayload } from './validacionesInformes';

export type DependenciasInformes = {
  empresas: RepositorioEmpresas;
  eventos: RepositorioEventosIncidente;
  informes: RepositorioInformes;
  almacen: AlmacenArchivos;
};

export type OpcionesInformes = {
  plantillasDir: string;
  zonaHoraria: string;
  diasInformeFinal: number;
};

export type ResultadoGeneracion =
  | { formato: 'json'; informe: InformeEstructurado; validacion: ResultadoValidacionAnci }
  | { formato: 'docx'; registro: InformeAnci; validacion: ResultadoValidacionAnci };

export type CuentaRegresivaIncidente = {
  incidenteId: string;
  indiceUnico: string;
  titulo: string;
  empresaId: string;
  razonSocial: string;
  estado: EstadoIncidente;
  cuentaRegresiva: CuentaRegresiva;
};

export function nombreArchivoInforme(indiceUnico: string, tipo: TipoInforme, fecha: Date, zonaHoraria: string): string {
  return `Informe_ANCI_${indiceUnico}_${tipo}_${marcaTiempoArchivo(fecha, zonaHoraria)}.docx`;
}

export class ServicioInformesAnci {
  constructor(
    private readonly deps: DependenciasInformes,
    private readonly incidentes: ServicioIncidentes,
    private readonly opciones: OpcionesInformes
  ) {}

  async plantillas(contexto: ContextoUsuario, empresaId?: string): Promise<PlantillaAnci[]> {
    if (!empresaId) return plantillasParaEmpresa(null, this.opciones.diasInformeFinal);
    const empresa = await obtenerEmpresaAccesible(this.deps.empresas, contexto, empresaId);
    return plantillasParaEmpresa(empresa.tipoEmpresa, this.opciones.diasInformeFinal);
  }

  private async contextoInforme(incidente: Incidente, empresa: Empresa, tipo: TipoInforme): Promise<ContextoInforme> {
    const eventos = await this.deps.eventos.listarPorIncidente(incidente.id);
    const plazo = this.incidentes.cuentaRegresiva(incidente, empresa).plazos.find((p) => p.tipo === tipo);
    return {
      semilla: incidente.semillaBase,
      estadoIncidente: incidente.estado,
      eventos,
      plazoLimite: plazo?.limite ?? null,
      generadoEn: this.incidentes.reloj.now(),
      zonaHoraria: this.opciones.zonaHoraria
    };
  }

  async generar(contexto: ContextoUsuario, incidenteId: string, datos: GenerarInformePayload): Promise<ResultadoGeneracion> {
    const { incidente, empresa } = await this.incidentes.obtenerConEmpresa(contexto, incidenteId);
    const tipo = datos.tipoInforme;
    if (!informeAplica(tipo, empresa.tipoEmpresa)) {
      throw new ErrorAplicacion('INFORME_NO_APLICA', `${NOMBRES_INFORME[tipo]} solo aplica a empresas OIV`, 422);
    }

    const validacion = validarCamposAnci(incidente.semillaBase, tipo);
    if (!validacion.valido && !datos.forzar) {
      throw new ErrorAplicacion(
        'CAMPOS_ANCI_FALTANTES',
        `Faltan ${validacion.faltantes.length} campos obligatorios para ${NOMBRES_INFORME[tipo]}`,
        422,
        validacion.faltantes
      );
    }

    const ctxInforme = await this.contextoInforme(incidente, empresa, tipo);
    const informe = construirInformeEstructurado(tipo, ctxInforme);
    if (datos.formato === 'json') {
      registrarInformeGenerado(tipo, 'json');
      return { formato: 'json', informe, validacion };
    }

    const ahora = ctxInforme.generadoEn;
    const plantilla = await cargarPlantilla(this.opciones.plantillasDir, obtenerPlantilla(tipo).archivoPlantilla);
    let contenido: Buffer;
    let marcadoresDesconocidos: string[] = [];
    if (plantilla) {
      const resultado = await sustituirMarcadores(plantilla, construirMarcadores(tipo, ctxInforme, ahora));
      contenido = resultado.contenido;
      marcadoresDesconocidos = resultado.marcadoresDesconocidos;
      if (marcadoresDesconocidos.length) {
        log('warn', 'Plantilla ANCI con marcadores desconocidos', { tipo, marcadores: marcadoresDesconocidos });
      }
    } else {
      contenido = await construirDocumento(informe);
    }

    const nombreArchivo = nombreArchivoInforme(incidente.indiceUnico, tipo, ahora, this.opciones.zonaHoraria);
    const ruta = `${carpetaIncidente(incidente.empresaId, incidente.indiceUnico)}/informes_anci/${nombreArchivo}`;
    await this.deps.almacen.guardar(ruta, contenido);

    const registro = await this.deps.informes.registrar({
      incidenteId: incidente.id,
      empresaId: incidente.empresaId,
      tipoInforme: tipo,
      nombreArchivo,
      ruta,
      tamanoBytes: contenido.length,
      hashSha256: createHash('sha256').update(contenido).digest('hex'),
      versionSemilla: incidente.semillaBase.metadatos.version,
      usoPlantilla: plantilla !== null,
      marcadoresDesconocidos,
      generadoPor: contexto.usuarioId,
      generadoEn: ahora
    });
    registrarInformeGenerado(tipo, 'docx');

    await this.incidentes.registrarEvento(incidente, 'informe_generado', contexto.usuarioId, {
      informeId: registro.id,
      tipoInforme: tipo,
      nombreArchivo,
      forzado: !validacion.valido
    });
    log('info', 'Informe ANCI generado', { incidenteId: incidente.id, tipo, nombreArchivo });
    return { formato: 'docx', registro, validacion };
  }

  async historial(contexto: ContextoUsuario, incidenteId: string): Promise<InformeAnci[]> {
    const incidente = await this.incidentes.obtener(contexto, incidenteId);
    return this.deps.informes.listarPorIncidente(incidente.id);
  }

  async descargar(contexto: ContextoUsuario, informeId: string): Promise<{ informe: InformeAnci; contenido: Buffer }> {
    const informe = await this.deps.informes.buscarPorId(informeId);
    if (!informe) throw new ErrorAplicacion('INFORME_NO_ENCONTRADO', 'Informe no encontrado', 404);
    asegurarAccesoEmpresa(contexto, informe.empresaId);
    const contenido = await this.deps.almacen.leer(informe.ruta);
    return { informe, contenido };
  }

  /** Incidentes activos no cerrados, ordenados por el proximo limite pendiente. */
  async cuentaRegresivaGlobal(contexto: ContextoUsuario, empresaId?: string): Promise<CuentaRegresivaIncidente[]> {
    const incidentes = await this.incidentes.listar(contexto, { empresaId });
    const empresas = new Map<string, Empresa | null>();
    const resultado: CuentaRegresivaIncidente[] = [];

    for (const incidente of incidentes) {
      if (incidente.estado === 'cerrado') continue;
      if (!empresas.has(incidente.empresaId)) {
        empresas.set(incidente.empresaId, await this.deps.empresas.buscarPorId(incidente.empresaId));
      }
      const empresa = empresas.get(incidente.empresaId);
      if (!empresa) continue;
      resultado.push({
        incidenteId: incidente.id,
        indiceUnico: incidente.indiceUnico,
        titulo: incidente.titulo,
        empresaId: incidente.empresaId,
        razonSocial: empresa.razonSocial,
        estado: incidente.estado,
        cuentaRegresiva: this.incidentes.cuentaRegresiva(incidente, empresa)
      });
    }

    const limite = (item: CuentaRegresivaIncidente) =>
      item.cuentaRegresiva.proximo?.limite.getTime() ?? Number.POSITIVE_INFINITY;
    return resultado.sort((a, b) => {
      const [la, lb] = [limite(a), limite(b)];
      if (la === lb) return 0;
      return la < lb ? -1 : 1;
    });
  }
}
