/**
 * Catalogo de informes ANCI y su plantilla `.docx`.
 */
import {
  DIAS_INFORME_FINAL_POR_DEFECTO,
  esOiv,
  horasPlazo,
  NOMBRES_INFORME,
  type TipoEmpresa,
  type TipoInforme
} from '../../modulo_incidentes/domain/plazos';

export type PlantillaAnci = {
  tipo: TipoInforme;
  nombre: string;
  descripcion: string;
  horas: number;
  soloOiv: boolean;
  archivoPlantilla: string;
};

type DefinicionPlantilla = Omit<PlantillaAnci, 'nombre' | 'horas'>;

const DEFINICIONES: readonly DefinicionPlantilla[] = [
  {
    tipo: 'alerta_temprana',
    descripcion: 'Primer aviso a la ANCI con la identificacion de la entidad y del incidente',
    soloOiv: false,
    archivoPlantilla: 'alerta_temprana.docx'
  },
  {
    tipo: 'informe_preliminar',
    descripcion: 'Gravedad, impacto, indicadores de compromiso y causa preliminar (24 h para OIV con servicio esencial afectado)',
    soloOiv: false,
    archivoPlantilla: 'informe_preliminar.docx'
  },
  {
    tipo: 'informe_completo',
    descripcion: 'Actualizacion del preliminar con el detalle de cada taxonomia',
    soloOiv: false,
    archivoPlantilla: 'informe_completo.docx'
  },
  {
    tipo: 'plan_accion',
    descripcion: 'Programa de recuperacion y responsables; exigible solo a OIV',
    soloOiv: true,
    archivoPlantilla: 'plan_accion.docx'
  },
  {
    tipo: 'informe_final',
    descripcion: 'Causa raiz, lecciones aprendidas, impacto economico y cronologia del incidente',
    soloOiv: false,
    archivoPlantilla: 'informe_final.docx'
  }
];

/** Horas de referencia: las de una empresa sin servicio esencial afectado. */
export function construirPlantillas(diasInformeFinal = DIAS_INFORME_FINAL_POR_DEFECTO): PlantillaAnci[] {
  return DEFINICIONES.map((def) => ({
    ...def,
    nombre: NOMBRES_INFORME[def.tipo],
    horas: horasPlazo(def.tipo, { tipoEmpresa: 'OIV', servicioEsencialAfectado: false }, { diasInformeFinal })
  }));
}

export const PLANTILLAS_ANCI: readonly PlantillaAnci[] = construirPlantillas();

export function plantillasParaEmpresa(tipoEmpresa: TipoEmpresa | null, diasInformeFinal?: number): PlantillaAnci[] {
  const todas = construirPlantillas(diasInformeFinal);
  if (!tipoEmpresa) return todas;
  return todas.filter((p) => !p.soloOiv || esOiv(tipoEmpresa));
}

export function obtenerPlantilla(tipo: TipoInforme): PlantillaAnci {
  const plantilla = PLANTILLAS_ANCI.find((p) => p.tipo === tipo);
  if (!plantilla) throw new Error(`Tipo de informe sin plantilla: ${tipo}`);
  return plantilla;
}
