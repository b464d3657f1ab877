/**
 * Reloj + azar inyectables. Permite que los tests corran los loops de
 * reintento sin esperas reales y con aleatoriedad determinista.
 */
export interface ClockPort {
  now(): number;
  sleep(ms: number): Promise<void>;
  /** Número en [0, 1) */
  random(): number;
}

export const CLOCK = Symbol('CLOCK');
