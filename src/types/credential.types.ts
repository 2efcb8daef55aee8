export interface CredentialRecord {
    accessToken: string | null;
    refreshToken: string | null;
    /** Epoch milliseconds; null when the provider did not report an expiry. */
    expiryDate: number | null;
    scopes: string[];
    tokenType: string | null;
}
