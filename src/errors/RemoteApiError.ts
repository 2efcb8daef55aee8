import { BaseError } from "./BaseError";

export class RemoteApiError extends BaseError {
	constructor(message: string) {
		super("RemoteApiError", message, 502);
	}
}
