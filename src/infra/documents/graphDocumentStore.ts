import { z } from "zod";
import { GraphCredentials } from "../../config/env.js";
import { DocumentStore, DocumentStoreEntry } from "../../domain/documentStore.js";
import {
  DocumentNotFoundError,
  TransientError,
  UnauthorizedError,
} from "../../domain/errors.js";

const GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";
const LOGIN_BASE_URL = "https://login.microsoftonline.com";
const GRAPH_SCOPE = "https://graph.microsoft.com/.default";
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.coerce.number(),
});

const childrenResponseSchema = z.object({
  value: z.array(
    z.object({
      name: z.string(),
      folder: z.object({}).passthrough().optional(),
    }),
  ),
  "@odata.nextLink": z.string().optional(),
});

interface CachedToken {
  value: string;
  expiresAt: number;
}

/**
 * Reads the default document library of a SharePoint site through Microsoft
 * Graph, authenticated with the client-credentials flow.
 */
export class GraphDocumentStore implements DocumentStore {
  private token: CachedToken | null = null;

  constructor(
    private readonly credentials: GraphCredentials,
    private readonly now: () => number = Date.now,
  ) {}

  async list(storePath: string): Promise<DocumentStoreEntry[]> {
    const entries: DocumentStoreEntry[] = [];
    let url: string | undefined = this.itemUrl(storePath, "children");

    while (url) {
      const response = await this.request(url, storePath);
      const page = childrenResponseSchema.parse(await response.json());
      for (const item of page.value) {
        entries.push({ name: item.name, isFolder: item.folder !== undefined });
      }
      url = page["@odata.nextLink"];
    }

    return entries;
  }

  async fetch(storePath: string): Promise<Buffer> {
    const response = await this.request(this.itemUrl(storePath, "content"), storePath);
    return Buffer.from(await response.arrayBuffer());
  }

  private itemUrl(storePath: string, action: "children" | "content"): string {
    const drive = `${GRAPH_BASE_URL}/sites/${encodeURIComponent(this.credentials.siteId)}/drive`;
    const trimmed = storePath.replace(/^\/+|\/+$/g, "");
    if (!trimmed) {
      return `${drive}/root/${action}`;
    }
    const encoded = trimmed.split("/").map(encodeURIComponent).join("/");
    return `${drive}/root:/${encoded}:/${action}`;
  }

  private async request(url: string, storePath: string): Promise<Response> {
    let response = await this.send(url, storePath);
    if (response.status === 401) {
      // The cached token was rejected; retry once with a fresh one.
      this.token = null;
      await response.body?.cancel();
      response = await this.send(url, storePath);
    }

    if (response.ok) {
      return response;
    }
    if (response.status === 401) {
      this.token = null;
    }
    throw await mapGraphError(response, storePath);
  }

  private async send(url: string, storePath: string): Promise<Response> {
    const token = await this.accessToken();
    try {
      return await fetch(url, { headers: { Authorization: `Bearer ${token}` } });
    } catch (error) {
      throw new TransientError(`Microsoft Graph request failed: ${storePath || "/"}`, {
        cause: error,
      });
    }
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value;
    }

    const { tenantId, clientId, clientSecret } = this.credentials;
    let response: Response;
    try {
      response = await fetch(
        `${LOGIN_BASE_URL}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`,
        {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          body: new URLSearchParams({
            client_id: clientId,
            client_secret: clientSecret,
            scope: GRAPH_SCOPE,
            grant_type: "client_credentials",
          }),
        },
      );
    } catch (error) {
      throw new TransientError("Microsoft identity platform unreachable.", { cause: error });
    }

    if (!response.ok) {
      if (response.status >= 500 || response.status === 429) {
        throw new TransientError(`Token request failed (${response.status}).`);
      }
      throw new UnauthorizedError(
        `Token request rejected (${response.status}): ${await response.text()}`,
      );
    }

    const data = tokenResponseSchema.parse(await response.json());
    this.token = {
      value: data.access_token,
      expiresAt: this.now() + data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    return this.token.value;
  }
}

async function mapGraphError(response: Response, storePath: string): Promise<Error> {
  const body = await response.text();
  if (response.status === 404) {
    return new DocumentNotFoundError(storePath);
  }
  if (response.status === 401 || response.status === 403) {
    return new UnauthorizedError(`Microsoft Graph denied access (${response.status}): ${storePath || "/"}`);
  }
  if (response.status === 429 || response.status >= 500) {
    return new TransientError(`Microsoft Graph unavailable (${response.status}): ${body}`);
  }
  return new Error(`Microsoft Graph request failed (${response.status}): ${body}`);
}
