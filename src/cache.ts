/**
 * Model cache configuration for transformers.js.
 *
 * Kept apart from embeddings.ts so the entry point can point the cache at disk
 * before any pipeline is constructed.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@huggingface/transformers";

/**
 * Point the transformers.js model cache at a filesystem directory.
 *
 * @param cacheDir Optional explicit directory. Falls back to TRANSFORMERS_CACHE,
 *                 then a project-local .cache/transformers folder.
 * @returns Resolved cache directory path actually used.
 */
export async function configureTransformersCache(cacheDir?: string): Promise<string> {
  const dir =
    cacheDir?.trim() ||
    process.env.TRANSFORMERS_CACHE?.trim() ||
    path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false;
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[RAG] Using TRANSFORMERS cache at: ${env.cacheDir}`);
  return dir;
}
