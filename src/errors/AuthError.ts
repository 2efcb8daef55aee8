import { BaseError } from "./BaseError";

/** OAuth2 credentials could not be loaded, refreshed or obtained. */
export class AuthError extends BaseError {
	constructor(message: string) {
		super("AuthError", message, 401);
	}
}
