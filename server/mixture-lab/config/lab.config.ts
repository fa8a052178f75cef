/**
 * Lab Config - Configuração do Laboratório de Misturas Gaussianas
 *
 * Schemas Zod para todas as opções ajustáveis do núcleo:
 * - Nível de log
 * - Caminho de cálculo do OLR (rápido / fallback / automático)
 * - Tolerância da restrição de soma
 * - Limite de tentativas do embaralhador de grafos
 *
 * @version 1.0.0
 */

import { z } from "zod";

// ============================================================================
// PRIMITIVE SCHEMAS
// ============================================================================

export const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const overlapPathSchema = z.enum(["auto", "fast", "fallback"]);

/**
 * Lê o nível de log de uma string qualquer (ex: variável de ambiente).
 * Valores desconhecidos caem no default "info".
 */
export function parseLogLevel(raw: string | undefined): z.infer<typeof logLevelSchema> {
  const parsed = logLevelSchema.safeParse(raw);
  return parsed.success ? parsed.data : "info";
}

// ============================================================================
// LAB CONFIG
// ============================================================================

export const labConfigSchema = z.object({
  logLevel: logLevelSchema.default("info"),

  overlapPath: overlapPathSchema.default("auto"),

  sumTolerance: z.number()
    .positive("Tolerância deve ser positiva")
    .max(0.01, "Tolerância muito alta (máximo 0.01)")
    .default(1e-9),

  shuffleMaxAttempts: z.number()
    .int("Deve ser inteiro")
    .min(1, "Pelo menos 1 tentativa")
    .max(100_000, "Limite de tentativas muito alto")
    .default(1000),
});

export type LabConfig = z.infer<typeof labConfigSchema>;

export const DEFAULT_LAB_CONFIG: LabConfig = labConfigSchema.parse({});

/**
 * Monta a configuração a partir das variáveis de ambiente.
 *
 * Variáveis: LOG_LEVEL, LAB_OLR_PATH, LAB_SUM_TOLERANCE, LAB_SHUFFLE_MAX_ATTEMPTS
 */
export function loadLabConfig(env: Record<string, string | undefined> = process.env): LabConfig {
  return labConfigSchema.parse({
    logLevel: parseLogLevel(env.LOG_LEVEL),
    overlapPath: env.LAB_OLR_PATH,
    sumTolerance: env.LAB_SUM_TOLERANCE !== undefined ? Number(env.LAB_SUM_TOLERANCE) : undefined,
    shuffleMaxAttempts: env.LAB_SHUFFLE_MAX_ATTEMPTS !== undefined
      ? Number(env.LAB_SHUFFLE_MAX_ATTEMPTS)
      : undefined,
  });
}

// ============================================================================
// ACTIVE CONFIG
// ============================================================================

let activeConfig: LabConfig = loadLabConfig();

/**
 * Configuração em uso pelo motor de OLR, pela restrição de soma e pelo
 * embaralhador de grafos
 */
export function getLabConfig(): LabConfig {
  return activeConfig;
}

/**
 * Relê as variáveis de ambiente e substitui a configuração em uso
 */
export function reloadLabConfig(env: Record<string, string | undefined> = process.env): LabConfig {
  activeConfig = loadLabConfig(env);
  return activeConfig;
}
