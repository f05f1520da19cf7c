/**
 * Client configuration models and validation.
 */
import { z } from "zod";

export const DEFAULT_TIMEOUT_SECONDS = 60;

// Connection settings for the upload client, usually derived from CLI flags
export const ClientConfigurationSchema = z.object({
    validateSsl: z.boolean().default(true),
    trustStorePath: z.string().min(1).optional(),
    // Only read when trustStorePath is set
    trustStorePassword: z.string().optional(),
    timeoutSeconds: z.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
});

export type ClientConfiguration = z.infer<typeof ClientConfigurationSchema>;

export type ClientConfigurationInput = z.input<typeof ClientConfigurationSchema>;

export function parseClientConfiguration(config: unknown): ClientConfiguration {
    return ClientConfigurationSchema.parse(config);
}

export function validateClientConfiguration(config: unknown): boolean {
    return ClientConfigurationSchema.safeParse(config).success;
}
