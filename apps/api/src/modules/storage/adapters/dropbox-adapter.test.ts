import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { NotFoundError } from "../../../core/errors.js";
import { silentLogger } from "../../../core/logger.js";
import { DropboxAdapter } from "./dropbox-adapter.js";

const shareArgsSchema = z.object({
  path: z.string().optional(),
  url: z.string().optional(),
  settings: z.object({ expires: z.string().optional() }).passthrough().optional()
});

type RecordedCall = { route: string; args: z.infer<typeof shareArgsSchema> | null };

const CONTENT_URL = "https://content.dropbox.test/temp/backup_docs.zip";
const EXISTING_URL = "https://www.dropbox.test/s/existing/backup_docs.zip";

/** In-process stand-in for the RPC routes the adapter uses. */
function createFakeDropbox(options: { linkExists: boolean; files: Map<string, string> }) {
  const calls: RecordedCall[] = [];

  const fetchStub = async (input: string | URL | Request, init: RequestInit = {}): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    if (url.href === CONTENT_URL) {
      return new Response(options.files.get("/backups/docs/backup_docs.zip") ?? "");
    }
    const route = url.pathname.replace(/^\/2\//, "");
    const raw: unknown = typeof init.body === "string" ? JSON.parse(init.body) : null;
    const args = raw === null ? null : shareArgsSchema.parse(raw);
    calls.push({ route, args });

    switch (route) {
      case "users/get_current_account":
        return Response.json({ account_id: "dbid:test-account" });
      case "files/get_temporary_link":
        if (args?.path && options.files.has(args.path)) {
          return Response.json({ link: CONTENT_URL, metadata: { name: path.posix.basename(args.path) } });
        }
        return Response.json({ error_summary: "path/not_found/..", error: { ".tag": "path" } }, { status: 409 });
      case "sharing/create_shared_link_with_settings":
        if (options.linkExists) {
          return Response.json(
            { error_summary: "shared_link_already_exists/..", error: { ".tag": "shared_link_already_exists" } },
            { status: 409 }
          );
        }
        return Response.json({ url: "https://www.dropbox.test/s/new/backup_docs.zip", expires: args?.settings?.expires });
      case "sharing/list_shared_links":
        return Response.json({ links: [{ url: EXISTING_URL }], has_more: false });
      case "sharing/modify_shared_link_settings":
        return Response.json({ url: `${args?.url ?? ""}?renewed=1`, expires: args?.settings?.expires });
      default:
        return Response.json({ error_summary: "unsupported" }, { status: 400 });
    }
  };

  return { calls, fetchStub };
}

describe("DropboxAdapter", () => {
  const now = Date.parse("2024-01-02T03:04:05.678Z");
  let root: string;
  let files: Map<string, string>;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "backhaul-dropbox-"));
    files = new Map([["/backups/docs/backup_docs.zip", "archive bytes"]]);
    vi.spyOn(Date, "now").mockReturnValue(now);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    await rm(root, { recursive: true, force: true });
  });

  async function connect(linkExists = false) {
    const fake = createFakeDropbox({ linkExists, files });
    vi.stubGlobal("fetch", vi.fn(fake.fetchStub));
    const adapter = new DropboxAdapter(silentLogger());
    await adapter.initialize({ accessToken: "test-token" });
    return { adapter, fake };
  }

  it("should stream a download to a new nested directory", async () => {
    const { adapter } = await connect();
    const target = path.join(root, "restore", "nested", "backup_docs.zip");
    await adapter.download("backups/docs/backup_docs.zip", target);
    expect(await readFile(target, "utf8")).toBe("archive bytes");
  });

  it("should map a missing file to NotFoundError", async () => {
    const { adapter } = await connect();
    await expect(adapter.download("backups/none.zip", path.join(root, "none.zip"))).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should create a link with the requested expiry", async () => {
    const { adapter, fake } = await connect();
    const url = await adapter.generateShareLink("shared/docs/backup_docs.zip", 60_000);
    expect(url).toBe("https://www.dropbox.test/s/new/backup_docs.zip");
    const create = fake.calls.find((call) => call.route === "sharing/create_shared_link_with_settings");
    expect(create?.args?.settings?.expires).toBe("2024-01-02T03:05:05Z");
  });

  it("should move an existing link to the requested expiry", async () => {
    const { adapter, fake } = await connect(true);
    const url = await adapter.generateShareLink("shared/docs/backup_docs.zip", 3_600_000);
    expect(url).toBe(`${EXISTING_URL}?renewed=1`);
    const modify = fake.calls.find((call) => call.route === "sharing/modify_shared_link_settings");
    expect(modify?.args).toMatchObject({ url: EXISTING_URL, settings: { expires: "2024-01-02T04:04:05Z" } });
  });
});
