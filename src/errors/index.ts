export { BaseError } from "./BaseError";
export { ConfigError } from "./ConfigError";
export { AuthError } from "./AuthError";
export { RemoteApiError } from "./RemoteApiError";
