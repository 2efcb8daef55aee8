export const SCOPE_ALIASES = {
    documents: "https://www.googleapis.com/auth/documents",
    "drive.readonly": "https://www.googleapis.com/auth/drive.readonly",
    "drive.file": "https://www.googleapis.com/auth/drive.file",
} as const;

// comments.create needs a Drive write scope
export const DOCS_SCOPES: readonly string[] = [
    SCOPE_ALIASES.documents,
    SCOPE_ALIASES["drive.readonly"],
    SCOPE_ALIASES["drive.file"],
];

/** True when every requested scope was granted. */
export function coversScopes(granted: readonly string[], requested: readonly string[]): boolean {
    const grantedSet = new Set(granted);
    return requested.every((scope) => grantedSet.has(scope));
}

/** Google returns granted scopes as one space-delimited string. */
export function parseScopeString(scope: string | null | undefined): string[] {
    if (!scope) return [];
    return scope.split(/\s+/).filter(Boolean);
}
