import { EnvSchema, type Env } from '@swissrpg-bot/contract';

/**
 * ConfigModule `validate` hook. Throws on an invalid environment, which
 * aborts startup with every problem listed.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${problems}`);
  }
  return result.data;
}
