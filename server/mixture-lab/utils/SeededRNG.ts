/**
 * SeededRNG - Gerador de Números Aleatórios Determinístico
 *
 * Todos os operadores aleatórios do laboratório (inicializadores, mutações,
 * crossovers, embaralhador de grafos) recebem um SeededRNG, de modo que uma
 * execução é reproduzível a partir do seed.
 *
 * - Algoritmos: Mulberry32 (default) e xorshift128+
 * - Distribuições: uniforme, normal (Box-Muller), gama (Marsaglia-Tsang), Dirichlet
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
  /** Obter seed inicial */
  getSeed(): number;
  /** Resetar para seed inicial */
  reset(): void;
  /** Clonar RNG com mesmo estado */
  clone(): IRNG;
}

export type RNGAlgorithm = "mulberry32" | "xorshift128";

export interface RNGConfig {
  seed: number;
  algorithm?: RNGAlgorithm;
}

// ============================================================================
// MULBERRY32 IMPLEMENTATION
// ============================================================================

export class Mulberry32RNG implements IRNG {
  private readonly initialSeed: number;
  private state: number;

  constructor(seed: number) {
    this.initialSeed = seed >>> 0;
    this.state = this.initialSeed;
  }

  random(): number {
    let t = this.state += 0x6D2B79F5;
    t = Math.imul(t ^ t >>> 15, t | 1);
    t ^= t + Math.imul(t ^ t >>> 7, t | 61);
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  }

  getSeed(): number {
    return this.initialSeed;
  }

  reset(): void {
    this.state = this.initialSeed;
  }

  clone(): IRNG {
    const cloned = new Mulberry32RNG(this.initialSeed);
    cloned.state = this.state;
    return cloned;
  }
}

// ============================================================================
// XORSHIFT128+ IMPLEMENTATION
// ============================================================================

export class XorShift128PlusRNG implements IRNG {
  private readonly initialSeed: number;
  private state0: number;
  private state1: number;

  constructor(seed: number) {
    this.initialSeed = seed >>> 0;
    this.state0 = this.initialSeed;
    this.state1 = this.initialSeed ^ 0x5DEECE66D;
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

  getSeed(): number {
    return this.initialSeed;
  }

  reset(): void {
    this.state0 = this.initialSeed;
    this.state1 = this.initialSeed ^ 0x5DEECE66D;
  }

  clone(): IRNG {
    const cloned = new XorShift128PlusRNG(this.initialSeed);
    cloned.state0 = this.state0;
    cloned.state1 = this.state1;
    return cloned;
  }
}

// ============================================================================
// SEEDED RNG WRAPPER
// ============================================================================

export class SeededRNG {
  private readonly rng: IRNG;
  private readonly seed: number;
  private readonly algorithm: RNGAlgorithm;

  constructor(config: RNGConfig, rng?: IRNG) {
    this.seed = config.seed;
    this.algorithm = config.algorithm ?? "mulberry32";

    if (rng) {
      this.rng = rng;
    } else if (this.algorithm === "xorshift128") {
      this.rng = new XorShift128PlusRNG(config.seed);
    } else {
      this.rng = new Mulberry32RNG(config.seed);
    }
  }

  getSeed(): number {
    return this.seed;
  }

  /**
   * Número aleatório em [0, 1)
   */
  random(): number {
    return this.rng.random();
  }

  /**
   * Inteiro aleatório entre min e max (inclusive)
   */
  randomInt(min: number, max: number): number {
    return Math.floor(this.rng.random() * (max - min + 1)) + min;
  }

  /**
   * Float aleatório em [min, max)
   */
  randomFloat(min: number, max: number): number {
    return this.rng.random() * (max - min) + min;
  }

  /**
   * Booleano aleatório com probabilidade dada
   */
  randomBool(probability: number = 0.5): boolean {
    return this.rng.random() < probability;
  }

  /**
   * Selecionar elemento aleatório de um array
   */
  randomChoice<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new Error("Array vazio");
    }
    const index = Math.floor(this.rng.random() * array.length);
    return array[index];
  }

  /**
   * Distribuição normal (Box-Muller)
   */
  randomNormal(mean: number = 0, stdDev: number = 1): number {
    // 1 - u mantém o argumento do log em (0, 1]
    const u1 = 1 - this.rng.random();
    const u2 = this.rng.random();

    const z0 = Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2.0 * Math.PI * u2);

    return z0 * stdDev + mean;
  }

  /**
   * Distribuição gama com escala 1 (Marsaglia-Tsang)
   */
  randomGamma(shape: number): number {
    if (!(shape > 0)) {
      throw new Error("Shape da gama deve ser positivo");
    }

    if (shape < 1) {
      const u = 1 - this.rng.random();
      return this.randomGamma(shape + 1) * Math.pow(u, 1 / shape);
    }

    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);

    for (;;) {
      const x = this.randomNormal();
      const base = 1 + c * x;
      if (base <= 0) continue;

      const v = base * base * base;
      const u = 1 - this.rng.random();

      if (u < 1 - 0.0331 * x * x * x * x) return d * v;
      if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
    }
  }

  /**
   * Amostra de Dirichlet(alphas) - valores positivos que somam 1
   */
  randomDirichlet(alphas: readonly number[]): number[] {
    const draws = alphas.map(alpha => this.randomGamma(alpha));
    const total = draws.reduce((sum, v) => sum + v, 0);
    return draws.map(v => v / total);
  }

  reset(): void {
    this.rng.reset();
  }

  /**
   * Clonar RNG com mesmo estado interno
   */
  clone(): SeededRNG {
    return new SeededRNG({ seed: this.seed, algorithm: this.algorithm }, this.rng.clone());
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createSeededRNG(seed: number, algorithm?: RNGAlgorithm): SeededRNG {
  return new SeededRNG({ seed, algorithm });
}

export default SeededRNG;
