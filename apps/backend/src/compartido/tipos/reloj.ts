/**
 * Fuente de tiempo inyectable; las pruebas fijan `now()`.
 */
export interface Reloj {
  now(): Date;
}

export const relojSistema: Reloj = {
  now: () => new Date()
};
