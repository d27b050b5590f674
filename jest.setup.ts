// Keep test output quiet and deterministic; no pretty transport worker
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";
process.env.TZ = "UTC";
