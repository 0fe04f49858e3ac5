import { createClient, type Client } from "@libsql/client";

/** Cliente libsql para un archivo local ("file:packs/qa.db") o una URL de Turso. */
export function createDb(url: string, authToken?: string): Client {
  if (!url) throw new Error("Missing QA_DATABASE_URL");
  return createClient({
    url,
    ...(authToken ? { authToken } : {}),
  });
}
