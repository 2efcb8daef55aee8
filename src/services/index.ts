export { DocsOperations, NO_DOCUMENTS_FOUND } from "./docs.service";
export { createCredentialProvider, createGoogleClientsProvider } from "./google";
