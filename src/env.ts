import dotenv from "dotenv";

dotenv.config();

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

export const config = {
  // Overrides cache.dir from .twinscan.yml (CI runners usually point this at a restored cache path)
  TWINSCAN_CACHE_DIR: process.env.TWINSCAN_CACHE_DIR,
  // Overrides scan.workers
  TWINSCAN_WORKERS: optionalInt(process.env.TWINSCAN_WORKERS),
  // Only read when cache.backend is "redis" (e.g., redis://localhost:6379)
  REDIS_URL: process.env.REDIS_URL,
};
