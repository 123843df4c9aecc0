const SECRET_CODE = /AZMAR-\d{3}/g;

export function extractSecretCodes(journalText: string): string[] {
  return (journalText || "").match(SECRET_CODE) || [];
}
