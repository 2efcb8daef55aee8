import type { Config } from "../../config";
import { CredentialProvider } from "./auth/credential.provider";
import { GoogleOAuthFlow } from "./auth/oauth.flow";
import { DOCS_SCOPES } from "./auth/scopes";
import { createGoogleClients } from "./clients";
import type { GoogleClientsProvider } from "./clients";

export function createCredentialProvider(config: Config): CredentialProvider {
    return new CredentialProvider({
        tokenPath: config.GOOGLE_TOKEN_PATH,
        flow: new GoogleOAuthFlow({
            clientSecretPath: config.GOOGLE_CLIENT_SECRET_PATH,
            callbackPort: config.OAUTH_CALLBACK_PORT,
        }),
    });
}

export function createGoogleClientsProvider(credentials: CredentialProvider): GoogleClientsProvider {
    return async () => createGoogleClients(await credentials.getClient(DOCS_SCOPES));
}

export { CredentialProvider, GoogleOAuthFlow, DOCS_SCOPES, createGoogleClients };
export type { GoogleClients, GoogleClientsProvider, DocsClient, DriveClient } from "./clients";
