// Pruebas del contenido de informes ANCI: validacion, estructura y marcadores.
import { describe, expect, it } from 'vitest';
import { agregarEvidenciaTaxonomia, aplicarCambios, eliminarTaxonomia } from '../src/modulos/modulo_incidentes/domain/semilla';
import type { SemillaIncidente } from '../src/modulos/modulo_incidentes/domain/tiposSemilla';
import { validarCamposAnci } from '../src/modulos/modulo_incidentes/domain/validacionAnci';
import {
  construirInformeEstructurado,
  taxonomiaInicial,
  type ContextoInforme
} from '../src/modulos/modulo_informes_anci/domain/informeEstructurado';
import { construirMarcadores, esMarcadorConocido, MARCADORES } from '../src/modulos/modulo_informes_anci/domain/marcadores';
import { obtenerPlantilla, plantillasParaEmpresa } from '../src/modulos/modulo_informes_anci/domain/plantillasAnci';
import { TIPOS_INFORME } from '../src/modulos/modulo_incidentes/domain/plazos';
import { AHORA_PRUEBA, semillaCompleta, semillaMinima } from './utils/semillas';

function contexto(semilla: SemillaIncidente, cambios: Partial<ContextoInforme> = {}): ContextoInforme {
  return {
    semilla,
    estadoIncidente: 'abierto',
    eventos: [],
    plazoLimite: new Date('2025-06-15T15:00:00.000Z'),
    generadoEn: AHORA_PRUEBA,
    zonaHoraria: 'America/Santiago',
    ...cambios
  };
}

describe('validacion de campos ANCI', () => {
  it('lista los campos faltantes de la alerta temprana', () => {
    const resultado = validarCamposAnci(semillaMinima(), 'alerta_temprana');
    expect(resultado.valido).toBe(false);
    expect(resultado.faltantes.map((f) => f.campo)).toEqual([
      'cargoInformante',
      'telefono24x7',
      'emailOficialSeguridad',
      'descripcion',
      'sistemasAfectados',
      'alcanceGeografico',
      'seleccionadas',
      'incidenteEnCurso',
      'descripcionEstadoActual',
      'medidasContencion'
    ]);
    expect(resultado.faltantes[0]).toEqual({ seccion: 1, campo: 'cargoInformante', etiqueta: 'Cargo del contacto' });
  });

  it('acepta una semilla completa para todos los informes', () => {
    for (const tipo of TIPOS_INFORME) {
      expect(validarCamposAnci(semillaCompleta(), tipo).valido).toBe(true);
    }
  });

  it('exige causa raiz y lecciones solo en el informe final', () => {
    const semilla = aplicarCambios(semillaCompleta(), { causaRaiz: { causaIdentificada: '' } });
    expect(validarCamposAnci(semilla, 'informe_completo').valido).toBe(true);
    expect(validarCamposAnci(semilla, 'informe_final').faltantes).toEqual([
      { seccion: 6, campo: 'causaIdentificada', etiqueta: 'Causa raíz identificada' }
    ]);
  });
});

describe('informe estructurado', () => {
  it('arma la alerta temprana con referencia y cinco secciones', () => {
    const informe = construirInformeEstructurado('alerta_temprana', contexto(semillaCompleta()));
    expect(informe.titulo).toBe('Alerta Temprana: Ransomware en servidores');
    expect(informe.referencia).toEqual({
      tipoReporte: 'Alerta Temprana',
      idInterno: '1_12345678_INC_Ransomware_en_servidores',
      folioAnci: '',
      fechaGeneracion: '15/06/2025 10:30',
      plazoLimite: '15/06/2025 11:00'
    });
    expect(informe.secciones.map((s) => s.clave)).toEqual([
      'identificacion_entidad',
      'datos_contacto',
      'datos_incidente',
      'estado_actual',
      'acciones_inmediatas'
    ]);
    const datos = informe.secciones[2].campos;
    expect(datos.find((c) => c.etiqueta === 'Fecha y hora de detección')?.valor).toBe('15/06/2025 08:00');
    expect(datos.find((c) => c.etiqueta === 'Taxonomía inicial')?.valor).toBe('INC_DISP_INDS_RANS');
    expect(datos.find((c) => c.etiqueta === 'Sistemas afectados')?.valor).toBe('ERP, Facturacion');
  });

  it('trunca la descripcion breve de la alerta a 500 caracteres', () => {
    const semilla = aplicarCambios(semillaCompleta(), { identificacion: { descripcion: 'x'.repeat(600) } });
    const informe = construirInformeEstructurado('alerta_temprana', contexto(semilla));
    const breve = informe.secciones[2].campos.find((c) => c.etiqueta === 'Descripción breve');
    expect(breve?.valor).toBe(`${'x'.repeat(500)}...`);
  });

  it('usa Sin clasificar cuando no hay taxonomias', () => {
    expect(taxonomiaInicial(semillaMinima())).toBe('Sin clasificar');
  });

  it('extiende secciones segun el tipo de informe', () => {
    const claves = (tipo: (typeof TIPOS_INFORME)[number]) =>
      construirInformeEstructurado(tipo, contexto(semillaCompleta())).secciones.map((s) => s.clave);

    expect(claves('informe_preliminar')).toHaveLength(10);
    expect(claves('informe_completo').at(-1)).toBe('detalle_taxonomias');
    expect(claves('plan_accion').at(-1)).toBe('plan_recuperacion');
    expect(claves('informe_final')).toHaveLength(15);
    expect(claves('informe_final').at(-1)).toBe('cronologia');
  });

  it('detalla cada taxonomia con su categoria del catalogo', () => {
    const informe = construirInformeEstructurado('informe_completo', contexto(semillaCompleta()));
    const detalle = informe.secciones.find((s) => s.clave === 'detalle_taxonomias');
    expect(detalle?.campos).toEqual([
      { etiqueta: '4.1 INC_DISP_INDS_RANS (Ransomware)', valor: 'Archivos cifrados con nota de rescate' },
      { etiqueta: '4.1 Descripción del problema', valor: 'Servidor ERP cifrado' }
    ]);
  });

  it('no adjunta evidencias de taxonomias eliminadas', () => {
    const semilla = semillaCompleta();
    const { idUnico } = semilla.taxonomias.seleccionadas[0];
    const conEvidencia = agregarEvidenciaTaxonomia(semilla, idUnico, {
      archivoId: 'ev-1',
      nombreOriginal: 'nota_rescate.txt',
      ruta: 'evidencias/ev-1_nota_rescate.txt',
      tipoMime: 'text/plain',
      tamanoBytes: 12,
      hashSha256: 'abc',
      descripcion: '',
      subidoPor: 'usuario-1',
      subidoEn: AHORA_PRUEBA.toISOString()
    }).semilla;

    const antes = construirInformeEstructurado('informe_completo', contexto(conEvidencia));
    expect(antes.archivosAdjuntos.map((a) => [a.numero, a.ubicacion])).toEqual([['4.4.1.1', 'taxonomia INC_DISP_INDS_RANS']]);

    const sinTaxonomia = eliminarTaxonomia(conEvidencia, idUnico, 'usuario-1', AHORA_PRUEBA);
    expect(construirInformeEstructurado('informe_completo', contexto(sinTaxonomia)).archivosAdjuntos).toEqual([]);
  });

  it('incluye la cronologia de eventos en el informe final', () => {
    const informe = construirInformeEstructurado(
      'informe_final',
      contexto(semillaCompleta(), {
        eventos: [{ accion: 'incidente_creado', usuarioId: 'usuario-1', creadoEn: new Date('2025-06-15T12:05:00.000Z') }]
      })
    );
    expect(informe.secciones.at(-1)?.campos).toEqual([{ etiqueta: '15/06/2025 08:05', valor: 'incidente_creado (usuario-1)' }]);
  });
});

describe('marcadores de plantilla', () => {
  it('rellena valores y usa N/A para los vacios', () => {
    const valores = construirMarcadores('informe_preliminar', contexto(semillaCompleta(), { plazoLimite: null }), AHORA_PRUEBA);
    expect(valores).toMatchObject({
      FECHA_REPORTE: '15/06/2025 10:30',
      TIPO_REPORTE: 'INFORME PRELIMINAR',
      ID_INCIDENTE: '1_12345678_INC_Ransomware_en_servidores',
      CRITICIDAD: 'Alta',
      ESTADO: 'Abierto',
      RUT_EMPRESA: '12345678-5',
      TAXONOMIAS: 'INC_DISP_INDS_RANS',
      CAUSA_RAIZ: 'Credenciales robadas',
      IMPACTO_PRELIMINAR: 'Facturacion detenida',
      RESPONSABLE_CLIENTE: 'Equipo TI',
      REPORTE_ANCI_ID: 'N/A',
      FECHA_DECLARACION_ANCI: 'N/A',
      PLAZO_LIMITE: 'N/A'
    });
    expect(Object.keys(valores)).toHaveLength(MARCADORES.length);
  });

  it('cae al analisis preliminar cuando no hay causa identificada', () => {
    const semilla = aplicarCambios(semillaMinima(), { causaRaiz: { analisisPreliminar: 'Phishing' } });
    expect(construirMarcadores('alerta_temprana', contexto(semilla), AHORA_PRUEBA).CAUSA_RAIZ).toBe('Phishing');
  });

  it('reconoce solo los marcadores del catalogo', () => {
    expect(esMarcadorConocido('TITULO_INCIDENTE')).toBe(true);
    expect(esMarcadorConocido('OTRO')).toBe(false);
  });
});

describe('plantillas ANCI', () => {
  it('omite el plan de accion para PSE', () => {
    expect(plantillasParaEmpresa('PSE').map((p) => p.tipo)).toEqual([
      'alerta_temprana',
      'informe_preliminar',
      'informe_completo',
      'informe_final'
    ]);
    expect(plantillasParaEmpresa('AMBAS')).toHaveLength(5);
  });

  it('expone horas de referencia y archivo de plantilla', () => {
    expect(obtenerPlantilla('plan_accion')).toMatchObject({ horas: 168, soloOiv: true, archivoPlantilla: 'plan_accion.docx' });
    expect(plantillasParaEmpresa(null, 30).find((p) => p.tipo === 'informe_final')?.horas).toBe(720);
  });
});
