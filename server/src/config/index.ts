import { z } from 'zod';

const MIB = 1024 * 1024;

export const DEFAULT_TRUSTED_DOMAINS = [
    'farsiland.com',
    'farsiplex.com',
    'flnd.buzz',
    'namakade.com',
    'negahestan.com'
];

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

const domainSchema = z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z0-9-]+(\.[a-z0-9-]+)+$/, 'must be a bare host name such as cdn.example.com');

export const ResolverConfigSchema = z.object({
    trustedDomains: z.array(domainSchema).min(1),
    pageMaxBytes: z.number().int().positive(),
    mirrorMaxBytes: z.number().int().positive(),
    fetchTimeoutMs: z.number().int().positive(),
    mirrorTimeoutMs: z.number().int().positive(),
    raceTimeoutMs: z.number().int().positive(),
    matchTimeoutMs: z.number().int().positive(),
    matchInputCap: z.number().int().positive(),
    scriptMaxChars: z.number().int().positive(),
    mirrorCount: z.number().int().min(1).max(10),
    cacheTtlMs: z.number().int().nonnegative(),
    cacheMaxEntries: z.number().int().positive(),
    userAgent: z.string().min(1),
    port: z.number().int().min(0).max(65535)
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

export const DEFAULT_CONFIG: ResolverConfig = {
    trustedDomains: DEFAULT_TRUSTED_DOMAINS,
    pageMaxBytes: 10 * MIB,
    mirrorMaxBytes: 5 * MIB,
    fetchTimeoutMs: 15_000,
    mirrorTimeoutMs: 8_000,
    raceTimeoutMs: 10_000,
    matchTimeoutMs: 2_000,
    matchInputCap: 1_000_000,
    scriptMaxChars: 1_000_000,
    mirrorCount: 5,
    cacheTtlMs: 5 * 60 * 1000,
    cacheMaxEntries: 100,
    userAgent: DEFAULT_USER_AGENT,
    port: 3001
};

type Env = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
    if (value == null || value.trim() === '') {
        return fallback;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
};

const csvFromEnv = (value: string | undefined): string[] => {
    if (!value) return [];
    return value
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean);
};

/**
 * Builds the resolver configuration from an environment record. Unset or
 * blank variables fall back to DEFAULT_CONFIG; anything that fails the
 * schema throws with every offending key listed.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<ResolverConfig> = {}): ResolverConfig {
    const trusted = csvFromEnv(env.TRUSTED_DOMAINS);

    const raw = {
        trustedDomains: trusted.length > 0 ? trusted : DEFAULT_CONFIG.trustedDomains,
        pageMaxBytes: numberFromEnv(env.PAGE_MAX_BYTES, DEFAULT_CONFIG.pageMaxBytes),
        mirrorMaxBytes: numberFromEnv(env.MIRROR_MAX_BYTES, DEFAULT_CONFIG.mirrorMaxBytes),
        fetchTimeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, DEFAULT_CONFIG.fetchTimeoutMs),
        mirrorTimeoutMs: numberFromEnv(env.MIRROR_TIMEOUT_MS, DEFAULT_CONFIG.mirrorTimeoutMs),
        raceTimeoutMs: numberFromEnv(env.RACE_TIMEOUT_MS, DEFAULT_CONFIG.raceTimeoutMs),
        matchTimeoutMs: numberFromEnv(env.MATCH_TIMEOUT_MS, DEFAULT_CONFIG.matchTimeoutMs),
        matchInputCap: numberFromEnv(env.MATCH_INPUT_CAP, DEFAULT_CONFIG.matchInputCap),
        scriptMaxChars: numberFromEnv(env.SCRIPT_MAX_CHARS, DEFAULT_CONFIG.scriptMaxChars),
        mirrorCount: numberFromEnv(env.MIRROR_COUNT, DEFAULT_CONFIG.mirrorCount),
        cacheTtlMs: numberFromEnv(env.CACHE_TTL_MS, DEFAULT_CONFIG.cacheTtlMs),
        cacheMaxEntries: numberFromEnv(env.CACHE_MAX_ENTRIES, DEFAULT_CONFIG.cacheMaxEntries),
        userAgent: env.RESOLVER_USER_AGENT?.trim() || DEFAULT_CONFIG.userAgent,
        port: numberFromEnv(env.PORT, DEFAULT_CONFIG.port),
        ...overrides
    };

    const parsed = ResolverConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid resolver configuration: ${issues.join('; ')}`);
    }
    return parsed.data;
}
