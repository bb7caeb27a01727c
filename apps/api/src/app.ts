import path from "node:path";
import Fastify, { type FastifyError } from "fastify";
import cors from "@fastify/cors";
import { z } from "zod";
import type { EngineContext } from "./context.js";
import { BackhaulError, BackupStageError, ConfigurationError } from "./core/errors.js";

const backupBodySchema = z.object({
  sourcePath: z.string().min(1),
  storageType: z.string().min(1).optional()
});

const backupFilesBodySchema = z.object({
  baseDirectory: z.string().min(1),
  files: z.array(z.string().min(1)).min(1),
  storageType: z.string().min(1).optional()
});

const historyQuerySchema = z.object({
  sourcePath: z.string().min(1).optional()
});

const restoreBodySchema = z.object({
  backupPath: z.string().min(1),
  targetDir: z.string().min(1),
  storageType: z.string().min(1).optional()
});

const shareBodySchema = z.object({
  localPath: z.string().min(1),
  storageType: z.string().min(1),
  expiresInSeconds: z.number().int().positive().default(3600)
});

export async function buildApp(context: EngineContext) {
  const { backup, restore, shares, state, registry, watch, config } = context;
  const app = Fastify({ loggerInstance: context.logger });
  await app.register(cors, { origin: true });

  app.setErrorHandler<FastifyError>((error, _req, reply) => {
    if (error instanceof z.ZodError) {
      return reply.code(400).send({
        message: "Invalid request payload",
        issues: error.issues
      });
    }

    if (error instanceof BackhaulError) {
      return reply.code(error.statusCode).send({
        code: error.code,
        message: error.message,
        ...(error instanceof BackupStageError ? { stage: error.stage } : {}),
        ...(error instanceof ConfigurationError && error.keys.length > 0 ? { keys: error.keys } : {})
      });
    }

    if (error.code === "FST_ERR_CTP_EMPTY_JSON_BODY") {
      return reply.code(400).send({ message: "Body cannot be empty when content-type is set to application/json" });
    }

    const statusCode = typeof error.statusCode === "number" && error.statusCode >= 400 ? error.statusCode : 500;
    return reply.code(statusCode).send({ message: statusCode >= 500 ? "Internal server error" : error.message });
  });

  app.get("/healthz", async () => ({ ok: true }));

  app.post("/api/backups", async (req) => {
    const body = backupBodySchema.parse(req.body);
    const record = await backup.backupDirectory(body.sourcePath, body.storageType);
    return record ?? { sourcePath: path.resolve(body.sourcePath), skipped: true, reason: "No changes since the last backup" };
  });

  app.post("/api/backups/files", async (req) => {
    const body = backupFilesBodySchema.parse(req.body);
    return backup.backupFiles(body.files, body.baseDirectory, body.storageType);
  });

  app.get("/api/backups", async (req) => {
    const query = historyQuerySchema.parse(req.query);
    if (query.sourcePath) {
      return { sourcePath: query.sourcePath, items: state.history(query.sourcePath) };
    }
    return { items: state.snapshot() };
  });

  app.post("/api/restores", async (req) => {
    const body = restoreBodySchema.parse(req.body);
    return restore.restoreFromBackup(body.backupPath, body.targetDir, body.storageType);
  });

  app.post("/api/shares", async (req) => {
    const body = shareBodySchema.parse(req.body);
    return shares.shareFile(body.localPath, body.storageType, body.expiresInSeconds * 1000);
  });

  app.get("/api/storages", async () => ({
    items: registry.names(),
    configured: Object.keys(config.storage).sort(),
    defaultStorageType: config.globalStorageType
  }));

  app.get("/api/watch", async () => ({ running: watch.isRunning, items: watch.status() }));

  app.post("/api/watch/start", async () => {
    await watch.start();
    return { running: watch.isRunning, items: watch.status() };
  });

  app.post("/api/watch/stop", async () => {
    await watch.stop();
    return { running: watch.isRunning, items: watch.status() };
  });

  app.setNotFoundHandler((_req, reply) => reply.code(404).send({ message: "Not found" }));

  app.addHook("onClose", async () => {
    await watch.stop();
    await state.flush();
  });

  return app;
}
