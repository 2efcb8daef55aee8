import dotenv from "dotenv";
import path from "node:path";

const NODE_ENV = process.env.NODE_ENV || "development";

dotenv.config({
	path: path.join(__dirname, "..", "..", `.env.${NODE_ENV}`),
});
dotenv.config();

export interface Config {
	HOST: string;
	PORT: number;
	NODE_ENV: string;
	DEBUG: boolean;

	// OpenAI-compatible inference endpoint (Groq by default)
	LLM_API_KEY: string;
	LLM_BASE_URL: string;
	CHAT_MODEL: string;
	AGENT_MODEL: string;

	origin: string | string[];

	GOOGLE_CLIENT_SECRET_PATH: string;
	GOOGLE_TOKEN_PATH: string;
	OAUTH_CALLBACK_PORT: number;

	LOG_PATH: string;
	LOG_LEVEL: string;
	LOG_MAX_SIZE: string;
	LOG_DATE_PATTERN: string;
	LOG_FILE_GENERATION_SUPPORT: boolean;
}

export function cleanEnvVar(value: string | undefined, defaultValue: string = ""): string {
	if (!value) return defaultValue;
	return value.replace(/^["']|["']$/g, "").trim();
}

function parseOrigins(value: string | undefined): string | string[] {
	const raw = cleanEnvVar(value, "*");
	if (raw === "*") return "*";
	return raw
		.split(",")
		.map((origin) => origin.trim())
		.filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return {
		HOST: env.HOST ?? "0.0.0.0",
		PORT: +(env.PORT ?? "8000"),
		NODE_ENV: env.NODE_ENV ?? "development",
		DEBUG: env.DEBUG === "true",

		LLM_API_KEY: cleanEnvVar(env.GROQ_API_KEY),
		LLM_BASE_URL: cleanEnvVar(env.LLM_BASE_URL, "https://api.groq.com/openai/v1"),
		CHAT_MODEL: cleanEnvVar(env.CHAT_MODEL, "openai/gpt-oss-20b"),
		AGENT_MODEL: cleanEnvVar(env.AGENT_MODEL, "llama-3.3-70b-versatile"),

		origin: parseOrigins(env.ALLOWED_ORIGIN),

		GOOGLE_CLIENT_SECRET_PATH: cleanEnvVar(env.GOOGLE_CLIENT_SECRET_PATH, "./client_secret.json"),
		GOOGLE_TOKEN_PATH: cleanEnvVar(env.GOOGLE_TOKEN_PATH, "./token.json"),
		OAUTH_CALLBACK_PORT: +(env.OAUTH_CALLBACK_PORT ?? "8080"),

		LOG_PATH: env.LOG_PATH ?? ".",
		LOG_LEVEL: env.LOG_LEVEL ?? "info",
		LOG_MAX_SIZE: env.LOG_MAX_SIZE ?? "20m",
		LOG_DATE_PATTERN: env.LOG_DATE_PATTERN ?? "YYYY-MM-DD",
		LOG_FILE_GENERATION_SUPPORT: env.LOG_FILE_GENERATION_SUPPORT === "true",
	};
}

const config: Config = loadConfig();

export default config;
