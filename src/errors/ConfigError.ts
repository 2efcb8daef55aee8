import { BaseError } from "./BaseError";

/** A required credential or key is missing from the configuration. */
export class ConfigError extends BaseError {
	constructor(message: string) {
		super("ConfigError", message, 500);
	}
}
