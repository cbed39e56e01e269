// Repositorios en memoria para pruebas: reemplazan Mongo detras de las mismas interfaces.
import { ErrorAplicacion } from '../../src/compartido/errores/errorAplicacion';
import type { Reloj } from '../../src/compartido/tipos/reloj';
import type { Dependencias } from '../../src/dependencias';
import type { AlmacenArchivos } from '../../src/infraestructura/archivos/almacenLocal';
import type {
  CambiosUsuario,
  NuevoUsuario,
  RepositorioUsuarios,
  Usuario
} from '../../src/modulos/modulo_autenticacion/shared/tiposAutenticacion';
import type {
  CambiosEmpresa,
  Empresa,
  FiltroEmpresas,
  NuevaEmpresa,
  RepositorioEmpresas
} from '../../src/modulos/modulo_empresas/shared/tiposEmpresas';
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
} from '../../src/modulos/modulo_incidentes/shared/tiposIncidentes';
import type {
  InformeAnci,
  NuevoInformeAnci,
  RepositorioInformes
} from '../../src/modulos/modulo_informes_anci/shared/tiposInformes';

let secuencia = 0;

/** Id con forma de ObjectId (24 hex) para pasar las validaciones de entrada. */
export function nuevoId(): string {
  secuencia += 1;
  return secuencia.toString(16).padStart(24, '0');
}

/** Equivalente a `$set`: las claves `undefined` no pisan valores. */
function aplicarSet<T extends object>(actual: T, cambios: Partial<T>): T {
  const definidos = Object.fromEntries(Object.entries(cambios).filter(([, valor]) => valor !== undefined));
  return { ...actual, ...structuredClone(definidos) };
}

export class RelojFijo implements Reloj {
  constructor(private actual: Date) {}

  now(): Date {
    return new Date(this.actual);
  }

  fijar(fecha: Date) {
    this.actual = fecha;
  }

  avanzarHoras(horas: number) {
    this.actual = new Date(this.actual.getTime() + horas * 3_600_000);
  }
}

export class MemoriaUsuarios implements RepositorioUsuarios {
  readonly registros = new Map<string, Usuario>();

  constructor(private readonly reloj: Reloj) {}

  async buscarPorId(id: string) {
    const usuario = this.registros.get(id);
    return usuario ? structuredClone(usuario) : null;
  }

  async buscarPorCorreo(correo: string) {
    const buscado = correo.trim().toLowerCase();
    const usuario = [...this.registros.values()].find((u) => u.correo === buscado);
    return usuario ? structuredClone(usuario) : null;
  }

  async crear(datos: NuevoUsuario) {
    if ([...this.registros.values()].some((u) => u.correo === datos.correo)) {
      throw Object.assign(new Error('E11000 duplicate key'), { code: 11000 });
    }
    const usuario: Usuario = { ...structuredClone(datos), id: nuevoId(), ultimoAcceso: null, creadoEn: this.reloj.now() };
    this.registros.set(usuario.id, usuario);
    return structuredClone(usuario);
  }

  async actualizar(id: string, cambios: CambiosUsuario) {
    const actual = this.registros.get(id);
    if (!actual) return null;
    const nuevo = aplicarSet<Usuario>(actual, cambios);
    this.registros.set(id, nuevo);
    return structuredClone(nuevo);
  }
}

export class MemoriaEmpresas implements RepositorioEmpresas {
  readonly registros = new Map<string, Empresa>();

  constructor(private readonly reloj: Reloj) {}

  async listar(filtro: FiltroEmpresas) {
    return [...this.registros.values()]
      .filter((e) => filtro.incluirInactivas || e.activa)
      .filter((e) => !filtro.ids || filtro.ids.includes(e.id))
      .sort((a, b) => a.razonSocial.localeCompare(b.razonSocial))
      .map((e) => structuredClone(e));
  }

  async buscarPorId(id: string) {
    const empresa = this.registros.get(id);
    return empresa ? structuredClone(empresa) : null;
  }

  async buscarPorRut(rut: string) {
    const empresa = [...this.registros.values()].find((e) => e.rut === rut);
    return empresa ? structuredClone(empresa) : null;
  }

  async crear(datos: NuevaEmpresa) {
    const ahora = this.reloj.now();
    const empresa: Empresa = { ...structuredClone(datos), id: nuevoId(), activa: true, creadoEn: ahora, actualizadoEn: ahora };
    this.registros.set(empresa.id, empresa);
    return structuredClone(empresa);
  }

  async actualizar(id: string, cambios: CambiosEmpresa) {
    const actual = this.registros.get(id);
    if (!actual) return null;
    const nuevo = { ...aplicarSet<Empresa>(actual, cambios), actualizadoEn: this.reloj.now() };
    this.registros.set(id, nuevo);
    return structuredClone(nuevo);
  }
}

export class MemoriaIncidentes implements RepositorioIncidentes {
  readonly registros = new Map<string, Incidente>();
  private correlativo = 0;

  constructor(private readonly reloj: Reloj) {}

  async siguienteCorrelativo() {
    this.correlativo += 1;
    return this.correlativo;
  }

  async crear(datos: NuevoIncidente) {
    const ahora = this.reloj.now();
    const incidente: Incidente = { ...structuredClone(datos), id: nuevoId(), creadoEn: ahora, actualizadoEn: ahora };
    this.registros.set(incidente.id, incidente);
    return structuredClone(incidente);
  }

  async buscarPorId(id: string) {
    const incidente = this.registros.get(id);
    return incidente ? structuredClone(incidente) : null;
  }

  async listar(filtro: FiltroIncidentes) {
    return [...this.registros.values()]
      .filter((i) => filtro.incluirEliminados || i.activo)
      .filter((i) => !filtro.empresaIds || filtro.empresaIds.includes(i.empresaId))
      .filter((i) => !filtro.estado || i.estado === filtro.estado)
      .sort((a, b) => b.fechaDeteccion.getTime() - a.fechaDeteccion.getTime())
      .map((i) => structuredClone(i));
  }

  async actualizar(id: string, cambios: CambiosIncidente, condicion: CondicionActualizacion = {}) {
    const actual = this.registros.get(id);
    if (!actual) return null;
    if (condicion.versionBase !== undefined && actual.semillaBase.metadatos.version !== condicion.versionBase) return null;
    const nuevo = { ...aplicarSet<Incidente>(actual, cambios), actualizadoEn: this.reloj.now() };
    this.registros.set(id, nuevo);
    return structuredClone(nuevo);
  }

  async agregarReporteEnviado(id: string, reporte: ReporteEnviado, cambios: CambiosConReporte = {}, condicion: CondicionActualizacion = {}) {
    const actual = this.registros.get(id);
    if (!actual) return null;
    if (actual.reportesEnviados.some((r) => r.tipoInforme === reporte.tipoInforme)) return null;
    if (condicion.versionBase !== undefined && actual.semillaBase.metadatos.version !== condicion.versionBase) return null;
    const nuevo = {
      ...aplicarSet(actual, cambios),
      reportesEnviados: [...actual.reportesEnviados, structuredClone(reporte)],
      actualizadoEn: this.reloj.now()
    };
    this.registros.set(id, nuevo);
    return structuredClone(nuevo);
  }
}

export class MemoriaEventos implements RepositorioEventosIncidente {
  readonly registros: EventoIncidente[] = [];

  async registrar(evento: NuevoEvento) {
    const registro: EventoIncidente = { ...structuredClone(evento), id: nuevoId() };
    this.registros.push(registro);
    return structuredClone(registro);
  }

  async listarPorIncidente(incidenteId: string) {
    return this.registros.filter((e) => e.incidenteId === incidenteId).map((e) => structuredClone(e));
  }
}

export class MemoriaInformes implements RepositorioInformes {
  readonly registros: InformeAnci[] = [];

  async registrar(informe: NuevoInformeAnci) {
    const registro: InformeAnci = { ...structuredClone(informe), id: nuevoId() };
    this.registros.push(registro);
    return structuredClone(registro);
  }

  async buscarPorId(id: string) {
    const informe = this.registros.find((i) => i.id === id);
    return informe ? structuredClone(informe) : null;
  }

  async listarPorIncidente(incidenteId: string) {
    return this.registros
      .filter((i) => i.incidenteId === incidenteId)
      .sort((a, b) => b.generadoEn.getTime() - a.generadoEn.getTime())
      .map((i) => structuredClone(i));
  }
}

export class AlmacenMemoria implements AlmacenArchivos {
  readonly archivos = new Map<string, Buffer>();

  async guardar(rutaRelativa: string, contenido: Buffer) {
    this.archivos.set(rutaRelativa, Buffer.from(contenido));
  }

  async leer(rutaRelativa: string) {
    const contenido = this.archivos.get(rutaRelativa);
    if (!contenido) throw new ErrorAplicacion('ARCHIVO_NO_ENCONTRADO', 'Archivo no encontrado en el almacen', 404);
    return Buffer.from(contenido);
  }
}

export type DependenciasPrueba = Dependencias & {
  usuarios: MemoriaUsuarios;
  empresas: MemoriaEmpresas;
  incidentes: MemoriaIncidentes;
  eventos: MemoriaEventos;
  informes: MemoriaInformes;
  almacen: AlmacenMemoria;
  reloj: RelojFijo;
};

export const FECHA_BASE = new Date('2025-06-15T14:30:00.000Z');

export function crearDependenciasMemoria(ahora: Date = FECHA_BASE): DependenciasPrueba {
  const reloj = new RelojFijo(ahora);
  return {
    usuarios: new MemoriaUsuarios(reloj),
    empresas: new MemoriaEmpresas(reloj),
    incidentes: new MemoriaIncidentes(reloj),
    eventos: new MemoriaEventos(),
    informes: new MemoriaInformes(),
    almacen: new AlmacenMemoria(),
    reloj
  };
}
