import { type UserAgentConfigInput, UserAgentConfigSchema, validateConfig } from "../config";

export const DEFAULT_USER_AGENTS: readonly string[] = [
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
	"Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/121.0",
];

export class UserAgentRotator {
	private readonly agents: readonly string[];
	private readonly enabled: boolean;
	private index = 0;

	constructor(config: UserAgentConfigInput = {}) {
		const parsed = validateConfig(UserAgentConfigSchema, config, "user agent");
		this.enabled = parsed.enabled;
		this.agents = parsed.agents.length > 0 ? parsed.agents : DEFAULT_USER_AGENTS;
	}

	/** Next agent in rotation, or undefined when rotation is off. */
	next(): string | undefined {
		if (!this.enabled) return undefined;
		const agent = this.agents[this.index % this.agents.length];
		this.index = (this.index + 1) % this.agents.length;
		return agent;
	}
}
