/**
 * SeededRNG - Gerador de Números Aleatórios Determinístico
 *
 * Toda amostragem de carteiras aleatórias passa por aqui. O mesmo seed
 * reproduz exatamente a mesma sequência de candidatos, o que permite
 * auditar uma otimização estocástica ou uma data de rebalanceamento.
 *
 * POLÍTICA: Math.random() não é usado em nenhum ponto do otimizador.
 *
 * @version 1.0.0
 */

// ============================================================================
// TYPES
// ============================================================================

/**
 * Interface para gerador de números aleatórios
 */
export interface IRNG {
  /** Gerar número em [0, 1) */
  random(): number;
}

export type RNGAlgorithm = "mulberry32" | "xorshift128";

export interface RNGConfig {
  seed: number;
  algorithm?: RNGAlgorithm;
}

// ============================================================================
// MULBERRY32 IMPLEMENTATION
// ============================================================================

/**
 * Mulberry32 - período 2^32, suficiente para buscas de até milhões de carteiras
 */
export class Mulberry32RNG implements IRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  random(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

// ============================================================================
// XORSHIFT128+ IMPLEMENTATION
// ============================================================================

/**
 * xorshift128+ (variante 32 bits) - período maior para buscas muito longas
 */
export class XorShift128PlusRNG implements IRNG {
  private state0: number;
  private state1: number;

  constructor(seed: number) {
    this.state0 = seed >>> 0;
    this.state1 = this.state0 ^ 0x5deece66d;
  }

  random(): number {
    let s1 = this.state0;
    const s0 = this.state1;

    this.state0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this.state1 = s1;

    return ((this.state0 + this.state1) >>> 0) / 4294967296;
  }
}

// ============================================================================
// SEEDED RNG WRAPPER
// ============================================================================

/**
 * SeededRNG - Wrapper com as distribuições usadas pelo gerador de carteiras
 */
export class SeededRNG {
  private readonly rng: IRNG;

  constructor(config: RNGConfig) {
    switch (config.algorithm ?? "mulberry32") {
      case "xorshift128":
        this.rng = new XorShift128PlusRNG(config.seed);
        break;
      case "mulberry32":
      default:
        this.rng = new Mulberry32RNG(config.seed);
    }
  }

  /**
   * Número aleatório em [0, 1)
   */
  random(): number {
    return this.rng.random();
  }

  /**
   * Float aleatório entre min e max
   */
  randomFloat(min: number, max: number): number {
    return this.rng.random() * (max - min) + min;
  }

  /**
   * Distribuição normal (Box-Muller)
   */
  randomNormal(mean: number = 0, stdDev: number = 1): number {
    // 1 - u evita log(0)
    const u1 = 1 - this.rng.random();
    const u2 = this.rng.random();

    const z0 = Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2.0 * Math.PI * u2);

    return z0 * stdDev + mean;
  }

  /**
   * Distribuição exponencial
   */
  randomExponential(lambda: number = 1): number {
    return -Math.log(1 - this.rng.random()) / lambda;
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createSeededRNG(seed: number, algorithm?: RNGAlgorithm): SeededRNG {
  return new SeededRNG({ seed, algorithm });
}

/**
 * Criar seed a partir de string (hash)
 */
export function seedFromString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // 32 bits
  }
  return Math.abs(hash);
}

/**
 * Seed de uma data de rebalanceamento: depende apenas do seed base e da data,
 * nunca da ordem de execução (datas podem rodar em paralelo).
 */
export function createRebalanceSeed(baseSeed: number, date: Date): number {
  return seedFromString(`${baseSeed}-${date.toISOString().slice(0, 10)}`);
}
