// backend/services/shared/src/db/redactUri.ts

/** Replace credentials in a connection URI before it is logged. */
export function redactMongoUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@/]+)@/, "//***:***@");
  }
}
