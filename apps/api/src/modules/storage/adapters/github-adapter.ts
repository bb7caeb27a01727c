import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import type { StorageOptions } from "@backhaul/shared";
import { ConfigurationError, NotFoundError, TransferError, toTransferError } from "../../../core/errors.js";
import type { Logger } from "../../../core/logger.js";
import {
  normalizeRemotePath,
  notInitialized,
  option,
  optionalOption,
  requireOptions,
  saveResponseBody,
  unsupportedSharing,
  type StorageAdapter
} from "../storage-adapter.js";

/** GitHub rejects blobs above 100 MB through the contents API. */
export const GITHUB_MAX_FILE_BYTES = 100 * 1024 * 1024;
const DEFAULT_API_URL = "https://api.github.com";

type GitHubSession = {
  apiUrl: string;
  owner: string;
  repo: string;
  branch?: string;
  token: string;
};

type GitHubRequest = {
  method?: "GET" | "PUT" | "DELETE";
  body?: string;
  headers?: Record<string, string>;
};

function contentSha(payload: unknown): string | null {
  if (typeof payload === "object" && payload !== null && "sha" in payload && typeof payload.sha === "string") {
    return payload.sha;
  }
  return null;
}

/**
 * Stores backups as files committed to a repository through the REST contents
 * API. Every upload or delete is one commit.
 */
export class GitHubAdapter implements StorageAdapter {
  readonly name = "github";
  readonly supportsSharing = false;
  private current: GitHubSession | null = null;

  constructor(private readonly logger: Logger) {}

  async initialize(options: StorageOptions): Promise<void> {
    requireOptions(options, ["token", "owner", "repo"], "GitHub");
    const session: GitHubSession = {
      apiUrl: (optionalOption(options, "apiUrl") ?? DEFAULT_API_URL).replace(/\/+$/, ""),
      owner: option(options, "owner"),
      repo: option(options, "repo"),
      branch: optionalOption(options, "branch"),
      token: option(options, "token")
    };

    let response: Response;
    try {
      response = await this.request(session, `/repos/${encodeURIComponent(session.owner)}/${encodeURIComponent(session.repo)}`);
    } catch (error) {
      throw toTransferError(error, "Connecting to GitHub");
    }
    if (response.status === 404) {
      throw new ConfigurationError(`GitHub repository ${session.owner}/${session.repo} not found or not accessible`, ["owner", "repo"]);
    }
    if (!response.ok) {
      throw new TransferError(`Connecting to GitHub failed with status ${response.status}`);
    }
    this.current = session;
    this.logger.info({ storageType: this.name, repository: `${session.owner}/${session.repo}` }, "Connected to GitHub repository");
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const session = this.session();
    const info = await stat(localPath).catch(() => null);
    if (!info?.isFile()) {
      throw new NotFoundError(`Source file not found: ${localPath}`);
    }
    if (info.size > GITHUB_MAX_FILE_BYTES) {
      throw new TransferError(
        `File '${path.basename(localPath)}' is ${Math.round(info.size / (1024 * 1024))}MB which exceeds GitHub's 100MB file size limit`
      );
    }

    const normalized = normalizeRemotePath(remotePath);
    try {
      const sha = await this.lookupSha(session, normalized);
      const content = (await readFile(localPath)).toString("base64");
      const response = await this.request(session, this.contentsPath(session, normalized), {
        method: "PUT",
        body: JSON.stringify({
          message: `${sha ? "Update" : "Create"} ${normalized}`,
          content,
          ...(sha ? { sha } : {}),
          ...(session.branch ? { branch: session.branch } : {})
        })
      });
      if (!response.ok) {
        throw new TransferError(`GitHub rejected upload of ${normalized} with status ${response.status}`);
      }
    } catch (error) {
      throw toTransferError(error, `Upload of ${localPath} to GitHub`);
    }
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const session = this.session();
    const normalized = normalizeRemotePath(remotePath);
    let response: Response;
    try {
      response = await this.request(session, this.contentsPath(session, normalized, true), {
        headers: { Accept: "application/vnd.github.raw" }
      });
    } catch (error) {
      throw toTransferError(error, `Download of ${remotePath} from GitHub`);
    }
    if (response.status === 404) {
      throw new NotFoundError(`File not found in GitHub repository: ${remotePath}`);
    }
    if (!response.ok) {
      throw new TransferError(`Download of ${remotePath} from GitHub failed with status ${response.status}`);
    }
    try {
      await saveResponseBody(response, localPath);
    } catch (error) {
      throw toTransferError(error, `Download of ${remotePath} from GitHub`);
    }
  }

  async exists(remotePath: string): Promise<boolean> {
    const session = this.session();
    try {
      return (await this.lookupSha(session, normalizeRemotePath(remotePath))) !== null;
    } catch (error) {
      throw toTransferError(error, `Lookup of ${remotePath} in GitHub`);
    }
  }

  async delete(remotePath: string): Promise<void> {
    const session = this.session();
    const normalized = normalizeRemotePath(remotePath);
    try {
      const sha = await this.lookupSha(session, normalized);
      if (!sha) {
        return;
      }
      const response = await this.request(session, this.contentsPath(session, normalized), {
        method: "DELETE",
        body: JSON.stringify({
          message: `Delete ${normalized}`,
          sha,
          ...(session.branch ? { branch: session.branch } : {})
        })
      });
      if (response.status === 404) {
        return;
      }
      if (!response.ok) {
        throw new TransferError(`GitHub rejected delete of ${normalized} with status ${response.status}`);
      }
    } catch (error) {
      throw toTransferError(error, `Delete of ${remotePath} from GitHub`);
    }
  }

  async generateShareLink(): Promise<string> {
    throw unsupportedSharing(this.name);
  }

  async release(): Promise<void> {
    this.current = null;
  }

  private session(): GitHubSession {
    if (!this.current) {
      throw notInitialized(this.name);
    }
    return this.current;
  }

  private contentsPath(session: GitHubSession, remotePath: string, withRef = false): string {
    const encoded = remotePath.split("/").map(encodeURIComponent).join("/");
    const ref = withRef && session.branch ? `?ref=${encodeURIComponent(session.branch)}` : "";
    return `/repos/${encodeURIComponent(session.owner)}/${encodeURIComponent(session.repo)}/contents/${encoded}${ref}`;
  }

  private async lookupSha(session: GitHubSession, remotePath: string): Promise<string | null> {
    const response = await this.request(session, this.contentsPath(session, remotePath, true));
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new TransferError(`GitHub lookup of ${remotePath} failed with status ${response.status}`);
    }
    return contentSha(await response.json());
  }

  private request(session: GitHubSession, resource: string, init: GitHubRequest = {}): Promise<Response> {
    return fetch(`${session.apiUrl}${resource}`, {
      ...init,
      headers: {
        Accept: "application/vnd.github+json",
        Authorization: `Bearer ${session.token}`,
        "User-Agent": "backhaul",
        "X-GitHub-Api-Version": "2022-11-28",
        ...(init.body ? { "Content-Type": "application/json" } : {}),
        ...init.headers
      }
    });
  }
}
