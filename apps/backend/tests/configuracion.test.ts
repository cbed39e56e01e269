// Pruebas de configuracion.
import { describe, expect, it } from 'vitest';
import { configuracion, parsearNumeroSeguro } from '../src/configuracion';

describe('configuracion', () => {
  it('expone los valores del entorno de prueba', () => {
    expect(configuracion.entorno).toBe('test');
    expect(configuracion.jwtSecreto).toBe('test-secret');
    expect(configuracion.bcryptRondas).toBe(4);
    expect(configuracion.rateLimitLimit).toBe(10000);
    expect(configuracion.corsOrigenes).toEqual(expect.any(Array));
  });

  it('usa los plazos ANCI por defecto', () => {
    expect(configuracion.plazoInformeFinalDias).toBe(15);
    expect(configuracion.umbralPorVencer).toBe(0.25);
    expect(configuracion.zonaHoraria).toBe('America/Santiago');
  });
});

describe('parsearNumeroSeguro', () => {
  it('devuelve el valor por defecto ante vacios o no numericos', () => {
    expect(parsearNumeroSeguro(undefined, 7)).toBe(7);
    expect(parsearNumeroSeguro('  ', 7)).toBe(7);
    expect(parsearNumeroSeguro('abc', 7)).toBe(7);
  });

  it('acota al rango indicado', () => {
    expect(parsearNumeroSeguro('100', 7, { min: 1, max: 72 })).toBe(72);
    expect(parsearNumeroSeguro('0', 7, { min: 1, max: 72 })).toBe(1);
    expect(parsearNumeroSeguro(12, 7, { min: 1, max: 72 })).toBe(12);
  });
});
