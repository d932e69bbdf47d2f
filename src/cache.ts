/**
 * Transformers cache configuration utility.
 *
 * Kept apart from the embeddings module so the (heavy) transformers import is
 * only paid when the local embedding provider is actually selected.
 */
import fs from "node:fs/promises";
import path from "node:path";

/**
 * Configure the transformers model cache directory for Node.js execution.
 * Must run before the first pipeline is created.
 *
 * @param cacheDir Optional explicit directory (TRANSFORMERS_CACHE). Falls back
 *                 to a project-local .cache/transformers folder.
 * @returns Resolved cache directory path actually used.
 */
export async function configureTransformersCache(cacheDir?: string): Promise<string> {
  const dir = cacheDir?.trim() || path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  const { env } = await import("@huggingface/transformers");
  env.useBrowserCache = false; // filesystem cache in Node
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[Embeddings] Using transformers cache at: ${env.cacheDir}`);
  return dir;
}
