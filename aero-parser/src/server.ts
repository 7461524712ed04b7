import { CONFIG } from "./config";
import { buildApp } from "./app";
import { createDirectoryClient } from "./db/supa";

async function main() {
  const app = buildApp({ client: createDirectoryClient(CONFIG.SUPABASE_URL, CONFIG.SUPABASE_KEY) });
  try {
    await app.listen({ port: CONFIG.PORT, host: CONFIG.HOST });
    app.log.info(`aero-parser listening on http://${CONFIG.HOST}:${CONFIG.PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

void main();
