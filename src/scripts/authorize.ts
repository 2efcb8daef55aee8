import config from "../config";
import logger from "../config/logger";
import { createCredentialProvider, DOCS_SCOPES } from "../services/google";
import { errorMessage } from "../utils/error.utils";

/**
 * Primes the token cache ahead of the first agent request, which would
 * otherwise block on the browser consent screen.
 */
async function authorize(): Promise<void> {
    const credentials = createCredentialProvider(config);
    const record = await credentials.authenticate(DOCS_SCOPES);

    logger.info(`Google credentials cached at ${config.GOOGLE_TOKEN_PATH} (scopes: ${record.scopes.join(", ")})`);
}

authorize().catch((error: unknown) => {
    logger.error(`Authorization failed: ${errorMessage(error)}`);
    process.exit(1);
});
