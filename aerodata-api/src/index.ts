import {
  SupabaseAirportDirectory,
  createDirectoryClient,
  errorMessage,
  fetchCountries,
  loadCountries,
  logger,
  type CountryLookup,
} from "aero-parser";
import type { SupabaseClient } from "@supabase/supabase-js";
import { createApp } from "./app";
import { CONFIG } from "./config";

async function loadCountryTable(client: SupabaseClient | null): Promise<CountryLookup> {
  if (!client) return loadCountries();
  try {
    const table = await fetchCountries(client);
    logger.info({ countries: table.size }, "countries loaded from directory");
    return table;
  } catch (e) {
    logger.warn({ err: errorMessage(e) }, "could not load countries from directory, using bundled list");
    return loadCountries();
  }
}

async function main() {
  const client = createDirectoryClient(CONFIG.SUPABASE_URL, CONFIG.SUPABASE_KEY);
  if (!client) logger.warn("SUPABASE_URL/SUPABASE_KEY not set, reconciliation is disabled");

  const app = createApp({
    directory: client ? new SupabaseAirportDirectory(client) : null,
    countries: await loadCountryTable(client),
  });

  app.listen(CONFIG.PORT, () => {
    logger.info(`[aerodata-api] listening on :${CONFIG.PORT}`);
  });
}

main().catch((e) => {
  logger.fatal({ err: e }, "startup failed");
  process.exit(1);
});
