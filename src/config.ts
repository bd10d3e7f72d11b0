import { z } from "zod";
import { logger } from "./logger";
import { ConfigurationError } from "./resilience/errors";

export const RateLimitConfigSchema = z.object({
	maxRequestsPerSecond: z.number().positive(),
	maxConcurrent: z.number().int().positive(),
	burstSize: z.number().int().positive().default(1),
});

export const RetryConfigSchema = z.object({
	maxRetries: z.number().int().nonnegative().default(3),
	baseDelayMs: z.number().nonnegative().default(1_000),
	backoffFactor: z.number().min(1).default(2),
	maxDelayMs: z.number().nonnegative().default(60_000),
	jitter: z.boolean().default(false),
});

export const CircuitBreakerConfigSchema = z
	.object({
		failureThreshold: z.number().int().positive().default(5),
		recoveryTimeoutMs: z.number().positive().default(60_000),
		successThreshold: z.number().int().positive().default(2),
		halfOpenMaxCalls: z.number().int().positive().optional(),
	})
	.transform((c) => ({ ...c, halfOpenMaxCalls: c.halfOpenMaxCalls ?? c.successThreshold }));

const PROXY_SCHEMES = ["http://", "https://", "socks5://"];

export const ProxyConfigSchema = z.object({
	enabled: z.boolean().default(false),
	proxies: z
		.array(
			z.string().refine((p) => PROXY_SCHEMES.some((s) => p.startsWith(s)), {
				message: "proxy must start with http://, https:// or socks5://",
			}),
		)
		.default([]),
	rotationStrategy: z.literal("round-robin").default("round-robin"),
	cooldownMs: z.number().positive().default(300_000),
});

export const UserAgentConfigSchema = z.object({
	enabled: z.boolean().default(true),
	agents: z.array(z.string().min(1)).default([]),
});

export const MiddlewareConfigSchema = z.object({
	rateLimit: RateLimitConfigSchema,
	retry: RetryConfigSchema.default({}),
	circuitBreaker: CircuitBreakerConfigSchema.default({}),
	proxy: ProxyConfigSchema.default({}),
	userAgents: UserAgentConfigSchema.default({}),
	requestTimeoutMs: z.number().positive().default(30_000),
	perTargetBreakers: z.boolean().default(true),
	maxTrackedTargets: z.number().int().positive().default(500),
});

export const RetrySchedulerConfigSchema = z.object({
	checkIntervalMs: z.number().positive().default(30_000),
	baseDelayMs: z.number().nonnegative().default(300_000),
	backoffFactor: z.number().min(1).default(2),
	maxDelayMs: z.number().nonnegative().default(3_600_000),
	maxAttempts: z.number().int().nonnegative().default(5),
	maxWorkers: z.number().int().positive().default(5),
	resolvedRetentionMs: z.number().positive().default(30 * 24 * 3_600_000),
});

export type RateLimitConfig = z.output<typeof RateLimitConfigSchema>;
export type RateLimitConfigInput = z.input<typeof RateLimitConfigSchema>;
export type RetryConfig = z.output<typeof RetryConfigSchema>;
export type RetryConfigInput = z.input<typeof RetryConfigSchema>;
export type CircuitBreakerConfig = z.output<typeof CircuitBreakerConfigSchema>;
export type CircuitBreakerConfigInput = z.input<typeof CircuitBreakerConfigSchema>;
export type ProxyConfig = z.output<typeof ProxyConfigSchema>;
export type ProxyConfigInput = z.input<typeof ProxyConfigSchema>;
export type UserAgentConfig = z.output<typeof UserAgentConfigSchema>;
export type UserAgentConfigInput = z.input<typeof UserAgentConfigSchema>;
export type MiddlewareConfig = z.output<typeof MiddlewareConfigSchema>;
export type MiddlewareConfigInput = z.input<typeof MiddlewareConfigSchema>;
export type RetrySchedulerConfig = z.output<typeof RetrySchedulerConfigSchema>;
export type RetrySchedulerConfigInput = z.input<typeof RetrySchedulerConfigSchema>;

/**
 * Parses `input` against `schema`, converting zod issues into a
 * ConfigurationError so a bad value aborts construction.
 */
export function validateConfig<S extends z.ZodTypeAny>(
	schema: S,
	input: unknown,
	label: string,
): z.output<S> {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw new ConfigurationError(
			`Invalid ${label} configuration`,
			result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
		);
	}
	return result.data;
}

// --- Presets ---

type Preset = {
	rateLimit: { maxRequestsPerSecond: number; maxConcurrent: number };
	retry: { maxRetries: number; baseDelayMs: number };
	circuitBreaker: { failureThreshold: number; recoveryTimeoutMs: number };
};

export const PRESETS = {
	conservative: {
		rateLimit: { maxRequestsPerSecond: 2, maxConcurrent: 3 },
		retry: { maxRetries: 5, baseDelayMs: 2_000 },
		circuitBreaker: { failureThreshold: 3, recoveryTimeoutMs: 120_000 },
	},
	balanced: {
		rateLimit: { maxRequestsPerSecond: 4, maxConcurrent: 5 },
		retry: { maxRetries: 3, baseDelayMs: 1_000 },
		circuitBreaker: { failureThreshold: 5, recoveryTimeoutMs: 60_000 },
	},
	aggressive: {
		rateLimit: { maxRequestsPerSecond: 8, maxConcurrent: 10 },
		retry: { maxRetries: 2, baseDelayMs: 500 },
		circuitBreaker: { failureThreshold: 8, recoveryTimeoutMs: 30_000 },
	},
} satisfies Record<string, Preset>;

export type PresetName = keyof typeof PRESETS;

// --- Environment ---

const booleanFlag = z
	.enum(["true", "false", "1", "0"])
	.transform((v) => v === "true" || v === "1");

/** Splits on commas, semicolons or newlines; unsupported schemes are dropped. */
export function parseProxyList(raw: string): string[] {
	return raw
		.split(/[,;\n]/)
		.map((p) => p.trim())
		.filter((p) => PROXY_SCHEMES.some((s) => p.startsWith(s)));
}

export const EnvSchema = z.object({
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	PORT: z.coerce.number().int().nonnegative().default(3000),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
	STATE_DIR: z.string().min(1).default("data/state"),
	MIDDLEWARE_PRESET: z.enum(["conservative", "balanced", "aggressive"]).default("balanced"),
	MIDDLEWARE_RPS: z.coerce.number().optional(),
	MIDDLEWARE_MAX_CONCURRENT: z.coerce.number().optional(),
	MIDDLEWARE_BURST_SIZE: z.coerce.number().optional(),
	MIDDLEWARE_MAX_RETRIES: z.coerce.number().optional(),
	MIDDLEWARE_BASE_DELAY_MS: z.coerce.number().optional(),
	MIDDLEWARE_BACKOFF_FACTOR: z.coerce.number().optional(),
	MIDDLEWARE_MAX_DELAY_MS: z.coerce.number().optional(),
	MIDDLEWARE_JITTER: booleanFlag.optional(),
	MIDDLEWARE_FAILURE_THRESHOLD: z.coerce.number().optional(),
	MIDDLEWARE_RECOVERY_TIMEOUT_MS: z.coerce.number().optional(),
	MIDDLEWARE_SUCCESS_THRESHOLD: z.coerce.number().optional(),
	MIDDLEWARE_REQUEST_TIMEOUT_MS: z.coerce.number().optional(),
	MIDDLEWARE_PROXY_ENABLED: booleanFlag.optional(),
	MIDDLEWARE_PROXIES: z.string().optional(),
	MIDDLEWARE_PROXY_COOLDOWN_MS: z.coerce.number().optional(),
	MIDDLEWARE_UA_ROTATION: booleanFlag.optional(),
	RETRY_CHECK_INTERVAL_MS: z.coerce.number().optional(),
	RETRY_BASE_DELAY_MS: z.coerce.number().optional(),
	RETRY_MAX_DELAY_MS: z.coerce.number().optional(),
	RETRY_BACKOFF_FACTOR: z.coerce.number().optional(),
	RETRY_MAX_ATTEMPTS: z.coerce.number().optional(),
	RETRY_MAX_WORKERS: z.coerce.number().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export interface Config {
	env: Env["NODE_ENV"];
	port: number;
	logLevel: Env["LOG_LEVEL"];
	stateDir: string;
	middleware: MiddlewareConfig;
	scheduler: RetrySchedulerConfig;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
	const result = EnvSchema.safeParse(source);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
		logger.error("Invalid configuration", { issues });
		throw new ConfigurationError("Invalid configuration", issues);
	}
	const env = result.data;
	const preset = PRESETS[env.MIDDLEWARE_PRESET];

	const middleware = validateConfig(
		MiddlewareConfigSchema,
		{
			rateLimit: {
				maxRequestsPerSecond: env.MIDDLEWARE_RPS ?? preset.rateLimit.maxRequestsPerSecond,
				maxConcurrent: env.MIDDLEWARE_MAX_CONCURRENT ?? preset.rateLimit.maxConcurrent,
				burstSize: env.MIDDLEWARE_BURST_SIZE,
			},
			retry: {
				maxRetries: env.MIDDLEWARE_MAX_RETRIES ?? preset.retry.maxRetries,
				baseDelayMs: env.MIDDLEWARE_BASE_DELAY_MS ?? preset.retry.baseDelayMs,
				backoffFactor: env.MIDDLEWARE_BACKOFF_FACTOR,
				maxDelayMs: env.MIDDLEWARE_MAX_DELAY_MS,
				jitter: env.MIDDLEWARE_JITTER,
			},
			circuitBreaker: {
				failureThreshold: env.MIDDLEWARE_FAILURE_THRESHOLD ?? preset.circuitBreaker.failureThreshold,
				recoveryTimeoutMs:
					env.MIDDLEWARE_RECOVERY_TIMEOUT_MS ?? preset.circuitBreaker.recoveryTimeoutMs,
				successThreshold: env.MIDDLEWARE_SUCCESS_THRESHOLD,
			},
			proxy: {
				enabled: env.MIDDLEWARE_PROXY_ENABLED,
				proxies:
					env.MIDDLEWARE_PROXIES === undefined ? undefined : parseProxyList(env.MIDDLEWARE_PROXIES),
				cooldownMs: env.MIDDLEWARE_PROXY_COOLDOWN_MS,
			},
			userAgents: { enabled: env.MIDDLEWARE_UA_ROTATION },
			requestTimeoutMs: env.MIDDLEWARE_REQUEST_TIMEOUT_MS,
		},
		"middleware",
	);

	// zod defaults fill every variable left unset
	const scheduler = validateConfig(
		RetrySchedulerConfigSchema,
		{
			checkIntervalMs: env.RETRY_CHECK_INTERVAL_MS,
			baseDelayMs: env.RETRY_BASE_DELAY_MS,
			maxDelayMs: env.RETRY_MAX_DELAY_MS,
			backoffFactor: env.RETRY_BACKOFF_FACTOR,
			maxAttempts: env.RETRY_MAX_ATTEMPTS,
			maxWorkers: env.RETRY_MAX_WORKERS,
		},
		"retry scheduler",
	);

	return {
		env: env.NODE_ENV,
		port: env.PORT,
		logLevel: env.LOG_LEVEL,
		stateDir: env.STATE_DIR,
		middleware,
		scheduler,
	};
}
