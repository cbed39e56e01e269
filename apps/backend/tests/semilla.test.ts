// Pruebas de operaciones puras sobre la semilla del incidente.
import { describe, expect, it } from 'vitest';
import {
  agregarEvidenciaSeccion,
  agregarEvidenciaTaxonomia,
  agregarTaxonomia,
  aplicarCambios,
  copiaBase,
  eliminarEvidencia,
  eliminarTaxonomia,
  listarEvidencias,
  prepararParaGuardar,
  restaurarOriginal,
  resumenTaxonomias,
  serializarOrdenado,
  validarEstructura,
  verificarIntegridad
} from '../src/modulos/modulo_incidentes/domain/semilla';
import type { ArchivoEvidencia } from '../src/modulos/modulo_incidentes/domain/tiposSemilla';
import { AHORA_PRUEBA as ahora, semillaMinima as semillaPrueba } from './utils/semillas';

function archivo(archivoId: string): ArchivoEvidencia {
  return {
    archivoId,
    nombreOriginal: `${archivoId}.pdf`,
    ruta: `evidencias/${archivoId}.pdf`,
    tipoMime: 'application/pdf',
    tamanoBytes: 10,
    hashSha256: 'abc',
    descripcion: '',
    subidoPor: 'usuario-1',
    subidoEn: ahora.toISOString()
  };
}

describe('semilla', () => {
  it('crea la original en version 1 con datos de la empresa y checksum valido', () => {
    const semilla = semillaPrueba();
    expect(semilla.metadatos).toMatchObject({ version: 1, tipoSemilla: 'original', creadoPor: 'usuario-1' });
    expect(semilla.informante).toMatchObject({ razonSocial: 'Energia Austral SpA', rut: '12345678-5', tipoEntidad: 'OIV' });
    expect(verificarIntegridad(semilla)).toBe(true);
    expect(validarEstructura(semilla)).toEqual([]);
  });

  it('detecta alteraciones por checksum', () => {
    const semilla = semillaPrueba();
    semilla.identificacion.descripcion = 'alterada';
    expect(verificarIntegridad(semilla)).toBe(false);
  });

  it('serializa con claves ordenadas', () => {
    expect(serializarOrdenado({ b: 1, a: [2, { d: null, c: 'x' }] })).toBe('{"a":[2,{"c":"x","d":null}],"b":1}');
  });

  it('aplica cambios parciales sin mutar la entrada', () => {
    const semilla = semillaPrueba();
    const nueva = aplicarCambios(semilla, { impacto: { impactoOperativo: 'Facturacion detenida' }, anci: { iocs: { ips: ['10.0.0.1'] } } });
    expect(nueva.impacto.impactoOperativo).toBe('Facturacion detenida');
    expect(nueva.anci.iocs).toEqual({ ips: ['10.0.0.1'], hashes: [], dominios: [], urls: [], cuentasComprometidas: [] });
    expect(semilla.impacto.impactoOperativo).toBe('');
  });

  it('incrementa la version al guardar y conserva la linea al restaurar', () => {
    const base = copiaBase(semillaPrueba());
    expect(base.metadatos).toMatchObject({ version: 1, tipoSemilla: 'base' });

    const v2 = prepararParaGuardar(aplicarCambios(base, { identificacion: { titulo: 'Cambiado' } }), 'usuario-2', ahora);
    expect(v2.metadatos).toMatchObject({ version: 2, modificadoPor: 'usuario-2' });
    expect(verificarIntegridad(v2)).toBe(true);

    const restaurada = restaurarOriginal(semillaPrueba(), v2, 'usuario-3', ahora);
    expect(restaurada.metadatos.version).toBe(3);
    expect(restaurada.identificacion.titulo).toBe('Ransomware en servidores');
  });

  it('reporta problemas estructurales', () => {
    const semilla = aplicarCambios(semillaPrueba(), { informante: { nombreInformante: '' }, identificacion: { titulo: ' ' } });
    expect(validarEstructura(semilla)).toEqual(['Falta nombreInformante en la seccion 1', 'Falta titulo en la seccion 2']);
  });

  it('numera taxonomias sin reutilizar numeros eliminados', () => {
    const datos = { justificacion: 'Cifrado de archivos', descripcionProblema: '' };
    const uno = agregarTaxonomia(semillaPrueba(), { ...datos, codigo: 'INC_DISP_INDS_RANS' }, 'u', ahora);
    const sinUno = eliminarTaxonomia(uno.semilla, uno.taxonomia.idUnico, 'u', ahora);
    const dos = agregarTaxonomia(sinUno, { ...datos, codigo: 'INC_DISP_INDS_RANS' }, 'u', ahora);

    expect(dos.taxonomia.numeroOrden).toBe(2);
    expect(resumenTaxonomias(dos.semilla).totalActivas).toBe(1);
    expect(dos.semilla.taxonomias.historialCambios.map((c) => c.accion)).toEqual(['agregar', 'eliminar', 'agregar']);
  });

  it('rechaza una taxonomia duplicada activa', () => {
    const datos = { codigo: 'INC_DISP_DENE_DDOS', justificacion: 'Trafico anomalo', descripcionProblema: '' };
    const { semilla } = agregarTaxonomia(semillaPrueba(), datos, 'u', ahora);
    expect(() => agregarTaxonomia(semilla, datos, 'u', ahora)).toThrow('ya esta asignada');
  });

  it('numera evidencias por seccion y por taxonomia', () => {
    const primera = agregarEvidenciaSeccion(semillaPrueba(), 'identificacion', archivo('a1'));
    const segunda = agregarEvidenciaSeccion(primera.semilla, 'identificacion', archivo('a2'));
    expect([primera.evidencia.numero, segunda.evidencia.numero]).toEqual(['2.5.1', '2.5.2']);

    const tax = agregarTaxonomia(segunda.semilla, { codigo: 'INC_DISP_INDS_RANS', justificacion: 'x', descripcionProblema: '' }, 'u', ahora);
    const enTax = agregarEvidenciaTaxonomia(tax.semilla, tax.taxonomia.idUnico, archivo('t1'));
    expect(enTax.evidencia.numero).toBe('4.4.1.1');
  });

  it('oculta las evidencias de una taxonomia eliminada', () => {
    const tax = agregarTaxonomia(semillaPrueba(), { codigo: 'INC_DISP_INDS_RANS', justificacion: 'x', descripcionProblema: '' }, 'u', ahora);
    const enTax = agregarEvidenciaTaxonomia(tax.semilla, tax.taxonomia.idUnico, archivo('t1'));
    const sinTax = eliminarTaxonomia(enTax.semilla, tax.taxonomia.idUnico, 'u', ahora);

    expect(listarEvidencias(sinTax)).toEqual([]);
    expect(listarEvidencias(sinTax, { incluirEliminadas: true }).map((ev) => [ev.numero, ev.estado])).toEqual([['4.4.1.1', 'activo']]);
  });

  it('rechaza evidencias en secciones sin contenedor', () => {
    expect(() => agregarEvidenciaSeccion(semillaPrueba(), 'lecciones', archivo('x'))).toThrow('no admite evidencias');
  });

  it('elimina evidencias de forma logica sin liberar el numero', () => {
    const { semilla } = agregarEvidenciaSeccion(semillaPrueba(), 'impacto', archivo('b1'));
    const sinEvidencia = eliminarEvidencia(semilla, 'b1', ahora);
    expect(listarEvidencias(sinEvidencia)).toEqual([]);
    expect(listarEvidencias(sinEvidencia, { incluirEliminadas: true })[0]).toMatchObject({ estado: 'eliminado', numero: '3.4.1' });

    const otra = agregarEvidenciaSeccion(sinEvidencia, 'impacto', archivo('b2'));
    expect(otra.evidencia.numero).toBe('3.4.2');
    expect(() => eliminarEvidencia(sinEvidencia, 'b1', ahora)).toThrow('Evidencia no encontrada');
  });
});
