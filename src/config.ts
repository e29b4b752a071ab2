import { z } from 'zod';

// Environment variables and their defaults.
const EnvSchema = z.object({
    TREEGEN_LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default('warn'),
    TREEGEN_BINARY_ALPHABET: z.enum(['base64', 'base64url']).default('base64'),
});

export type Env = z.infer<typeof EnvSchema>;

export interface Config {
    readonly logLevel: Env['TREEGEN_LOG_LEVEL'];
    readonly binaryAlphabet: Env['TREEGEN_BINARY_ALPHABET'];
}

/**
 * Read configuration from the environment. Throws a `ZodError` when a
 * variable holds a value outside its allowed set.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
    const parsed = EnvSchema.parse(env);
    return Object.freeze({
        logLevel: parsed.TREEGEN_LOG_LEVEL,
        binaryAlphabet: parsed.TREEGEN_BINARY_ALPHABET,
    });
}
