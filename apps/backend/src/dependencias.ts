/**
 * Composicion de dependencias del backend.
 *
 * Las rutas reciben este objeto en lugar de importar repositorios concretos;
 * las pruebas lo reemplazan por implementaciones en memoria.
 */
import type { Reloj } from './compartido/tipos/reloj';
import { relojSistema } from './compartido/tipos/reloj';
import { configuracion } from './configuracion';
import { AlmacenLocal, type AlmacenArchivos } from './infraestructura/archivos/almacenLocal';
import { MongoRepositorioUsuarios } from './modulos/modulo_autenticacion/infra/repositorioUsuarios';
import type { RepositorioUsuarios } from './modulos/modulo_autenticacion/shared/tiposAutenticacion';
import { MongoRepositorioEmpresas } from './modulos/modulo_empresas/infra/repositorioEmpresas';
import type { RepositorioEmpresas } from './modulos/modulo_empresas/shared/tiposEmpresas';
import { MongoRepositorioEventos, MongoRepositorioIncidentes } from './modulos/modulo_incidentes/infra/repositoriosIncidentes';
import type { RepositorioEventosIncidente, RepositorioIncidentes } from './modulos/modulo_incidentes/shared/tiposIncidentes';
import { MongoRepositorioInformes } from './modulos/modulo_informes_anci/infra/repositorioInformes';
import type { RepositorioInformes } from './modulos/modulo_informes_anci/shared/tiposInformes';

export type Dependencias = {
  usuarios: RepositorioUsuarios;
  empresas: RepositorioEmpresas;
  incidentes: RepositorioIncidentes;
  eventos: RepositorioEventosIncidente;
  informes: RepositorioInformes;
  almacen: AlmacenArchivos;
  reloj: Reloj;
};

export function crearDependenciasMongo(): Dependencias {
  return {
    usuarios: new MongoRepositorioUsuarios(),
    empresas: new MongoRepositorioEmpresas(),
    incidentes: new MongoRepositorioIncidentes(),
    eventos: new MongoRepositorioEventos(),
    informes: new MongoRepositorioInformes(),
    almacen: new AlmacenLocal(configuracion.archivosDir),
    reloj: relojSistema
  };
}
