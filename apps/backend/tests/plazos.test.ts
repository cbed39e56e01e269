// Pruebas de plazos de reporte ANCI.
import { describe, expect, it } from 'vitest';
import {
  calcularPlazos,
  cuentaRegresiva,
  evaluarPlazo,
  horasPlazo,
  informeAplica
} from '../src/modulos/modulo_incidentes/domain/plazos';

const deteccion = new Date('2025-06-15T12:00:00.000Z');

describe('plazos ANCI', () => {
  it('calcula los cinco limites para una OIV con servicio esencial afectado', () => {
    const plazos = calcularPlazos({ tipoEmpresa: 'OIV', servicioEsencialAfectado: true, fechaDeteccion: deteccion });
    expect(plazos.map((p) => [p.tipo, p.horas, p.limite.toISOString()])).toEqual([
      ['alerta_temprana', 3, '2025-06-15T15:00:00.000Z'],
      ['informe_preliminar', 24, '2025-06-16T12:00:00.000Z'],
      ['informe_completo', 72, '2025-06-18T12:00:00.000Z'],
      ['plan_accion', 168, '2025-06-22T12:00:00.000Z'],
      ['informe_final', 360, '2025-06-30T12:00:00.000Z']
    ]);
  });

  it('usa 72 horas de preliminar sin servicio esencial afectado', () => {
    expect(horasPlazo('informe_preliminar', { tipoEmpresa: 'OIV', servicioEsencialAfectado: false })).toBe(72);
    expect(horasPlazo('informe_preliminar', { tipoEmpresa: 'PSE', servicioEsencialAfectado: true })).toBe(72);
  });

  it('aplica el plazo OIV de 24 horas a empresas AMBAS', () => {
    const plazos = calcularPlazos({ tipoEmpresa: 'AMBAS', servicioEsencialAfectado: true, fechaDeteccion: deteccion });
    expect(plazos.map((p) => [p.tipo, p.horas])).toEqual([
      ['alerta_temprana', 3],
      ['informe_preliminar', 24],
      ['informe_completo', 72],
      ['plan_accion', 168],
      ['informe_final', 360]
    ]);
    expect(horasPlazo('informe_preliminar', { tipoEmpresa: 'AMBAS', servicioEsencialAfectado: false })).toBe(72);
  });

  it('omite el plan de accion para PSE', () => {
    const plazos = calcularPlazos({ tipoEmpresa: 'PSE', servicioEsencialAfectado: false, fechaDeteccion: deteccion });
    expect(plazos.map((p) => p.tipo)).toEqual(['alerta_temprana', 'informe_preliminar', 'informe_completo', 'informe_final']);
    expect(informeAplica('plan_accion', 'PSE')).toBe(false);
    expect(informeAplica('plan_accion', 'AMBAS')).toBe(true);
  });

  it('respeta los dias configurados para el informe final', () => {
    expect(horasPlazo('informe_final', { tipoEmpresa: 'PSE', servicioEsencialAfectado: false }, { diasInformeFinal: 30 })).toBe(720);
  });

  it('clasifica pendiente, por vencer, vencido y enviado', () => {
    const [alerta] = calcularPlazos({ tipoEmpresa: 'OIV', servicioEsencialAfectado: true, fechaDeteccion: deteccion });

    const pendiente = evaluarPlazo(alerta, new Date('2025-06-15T13:00:00.000Z'));
    expect(pendiente).toMatchObject({ estado: 'pendiente', horasRestantes: 2, vencido: false });

    const porVencer = evaluarPlazo(alerta, new Date('2025-06-15T14:30:00.000Z'));
    expect(porVencer).toMatchObject({ estado: 'por_vencer', horasRestantes: 0.5 });

    const vencido = evaluarPlazo(alerta, new Date('2025-06-15T15:30:00.000Z'));
    expect(vencido).toMatchObject({ estado: 'vencido', horasRestantes: 0, vencido: true, enviadoATiempo: null });

    const enviado = evaluarPlazo(alerta, new Date('2025-06-15T15:30:00.000Z'), new Date('2025-06-15T14:00:00.000Z'));
    expect(enviado).toMatchObject({ estado: 'enviado', vencido: false, enviadoATiempo: true });
  });

  it('marca como tardio un envio posterior al limite', () => {
    const [alerta] = calcularPlazos({ tipoEmpresa: 'PSE', servicioEsencialAfectado: false, fechaDeteccion: deteccion });
    const estado = evaluarPlazo(alerta, new Date('2025-06-15T18:00:00.000Z'), new Date('2025-06-15T16:00:00.000Z'));
    expect(estado).toMatchObject({ estado: 'enviado', vencido: false, enviadoATiempo: false, horasRestantes: 0 });
  });

  it('pasa a por vencer justo en el umbral de la ventana', () => {
    // Alerta: ventana de 3 horas, umbral 0.25 => 45 minutos antes de las 15:00.
    const [alerta] = calcularPlazos({ tipoEmpresa: 'OIV', servicioEsencialAfectado: true, fechaDeteccion: deteccion });

    expect(evaluarPlazo(alerta, new Date('2025-06-15T14:14:00.000Z'))).toMatchObject({ estado: 'pendiente', horasRestantes: 0.77 });
    expect(evaluarPlazo(alerta, new Date('2025-06-15T14:15:00.000Z'))).toMatchObject({ estado: 'por_vencer', horasRestantes: 0.75 });
    expect(evaluarPlazo(alerta, new Date('2025-06-15T14:14:00.000Z'), null, 0.5).estado).toBe('por_vencer');
  });

  it('elige como proximo el primer plazo no vencido ni enviado', () => {
    const resultado = cuentaRegresiva(
      { tipoEmpresa: 'OIV', servicioEsencialAfectado: true, fechaDeteccion: deteccion },
      new Date('2025-06-15T15:30:00.000Z')
    );
    expect(resultado.plazos[0].estado).toBe('vencido');
    expect(resultado.proximo?.tipo).toBe('informe_preliminar');
  });

  it('devuelve proximo nulo cuando todo fue enviado', () => {
    const enviadoEn = new Date('2025-06-15T13:00:00.000Z');
    const resultado = cuentaRegresiva(
      { tipoEmpresa: 'PSE', servicioEsencialAfectado: false, fechaDeteccion: deteccion },
      new Date('2025-06-15T14:00:00.000Z'),
      { alerta_temprana: enviadoEn, informe_preliminar: enviadoEn, informe_completo: enviadoEn, informe_final: enviadoEn }
    );
    expect(resultado.proximo).toBeNull();
    expect(resultado.plazos.every((p) => p.estado === 'enviado')).toBe(true);
  });
});
