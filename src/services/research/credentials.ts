import fs from "node:fs";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { CredentialsError } from "./errors";
import { API_BASE_URL, OAUTH_TOKEN_PATH } from "./types";

export const apiCredentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  client_key: z.string().min(1),
});

export type ApiCredentials = z.infer<typeof apiCredentialsSchema>;

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().optional(),
    token_type: z.string().optional(),
  })
  .passthrough();

export function loadCredentials(filePath: string): ApiCredentials {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new CredentialsError(
      `Unable to read API credentials file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch {
    throw new CredentialsError(`API credentials file ${filePath} is not valid JSON`);
  }

  const parsed = apiCredentialsSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new CredentialsError(`API credentials file ${filePath} is missing or has empty fields: ${fields}`);
  }
  return parsed.data;
}

/** Exchanges client credentials for a bearer token. */
export async function fetchAccessToken(http: AxiosInstance, credentials: ApiCredentials): Promise<string> {
  const body = new URLSearchParams({
    client_key: credentials.client_key,
    client_secret: credentials.client_secret,
    grant_type: "client_credentials",
  });

  const response = await http.post<unknown>(`${API_BASE_URL}${OAUTH_TOKEN_PATH}`, body.toString(), {
    headers: {
      "Content-Type": "application/x-www-form-urlencoded",
      "Cache-Control": "no-cache",
    },
    validateStatus: () => true,
  });

  const parsed = tokenResponseSchema.safeParse(response.data);
  if (response.status !== 200 || !parsed.success) {
    throw new CredentialsError(`Access token request failed (HTTP ${response.status})`, response.status);
  }
  return parsed.data.access_token;
}
