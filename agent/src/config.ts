import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_RECONNECT_POLICY } from "./node/reconnect.js";

export const VERSION = "0.1.0";
export const DEFAULT_GATEWAY_URL = "ws://127.0.0.1:18789";
export const DEFAULT_CONFIG_PATH = "~/.desknode/node.json";

function expandHome(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

const ReconnectSchema = z.object({
	enabled: z.boolean().default(DEFAULT_RECONNECT_POLICY.enabled),
	baseDelayMs: z.number().int().positive().default(DEFAULT_RECONNECT_POLICY.baseDelayMs),
	maxDelayMs: z.number().int().positive().default(DEFAULT_RECONNECT_POLICY.maxDelayMs),
	maxAttempts: z.number().int().nonnegative().default(DEFAULT_RECONNECT_POLICY.maxAttempts),
});

export const ConfigSchema = z.object({
	gatewayUrl: z
		.string()
		.url()
		.refine((u) => /^wss?:\/\//i.test(u), "must be a ws:// or wss:// URL")
		.default(DEFAULT_GATEWAY_URL),
	token: z.string().default(""),
	dataDir: z.string().min(1).default("~/.desknode").transform(expandHome),
	clientId: z.string().min(1).default("node-host"),
	displayName: z.string().min(1).default(() => os.hostname()),
	platform: z.string().min(1).default(process.platform),
	version: z.string().default(VERSION),
	permissions: z.record(z.boolean()).default({
		"camera.capture": true,
		"screen.record": true,
	}),
	reconnect: ReconnectSchema.default({}),
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type NodeConfig = z.output<typeof ConfigSchema>;

const ENV_KEYS = {
	DESKNODE_GATEWAY_URL: "gatewayUrl",
	DESKNODE_TOKEN: "token",
	DESKNODE_DATA_DIR: "dataDir",
	DESKNODE_DISPLAY_NAME: "displayName",
	DESKNODE_LOG_LEVEL: "logLevel",
} as const satisfies Record<string, keyof NodeConfig>;

async function readJsonIfExists(filePath: string): Promise<unknown> {
	let text: string;
	try {
		text = await fs.readFile(filePath, "utf8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
		throw err;
	}
	try {
		return JSON.parse(text);
	} catch (err) {
		throw new Error(`Invalid config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
	}
}

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv;
	/** Config file path; DESKNODE_CONFIG or ~/.desknode/node.json when absent */
	file?: string;
}

/** File values first, then environment overrides, validated together */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<NodeConfig> {
	const env = options.env ?? process.env;
	const filePath = expandHome(options.file ?? env.DESKNODE_CONFIG ?? DEFAULT_CONFIG_PATH);
	const fromFile = await readJsonIfExists(filePath);
	if (typeof fromFile !== "object" || fromFile === null || Array.isArray(fromFile)) {
		throw new Error(`Invalid config\n${filePath}: expected a JSON object`);
	}

	const merged: Record<string, unknown> = { ...fromFile };
	for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
		const value = env[envKey];
		if (value !== undefined && value !== "") merged[configKey] = value;
	}

	const parsed = ConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
		throw new Error(`Invalid config\n${message}`);
	}
	return parsed.data;
}
