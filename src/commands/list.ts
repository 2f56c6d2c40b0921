import { loadApiConfig } from "../config/apiConfig";

export interface ListOptions {
  configPath: string;
}

export async function runList(options: ListOptions): Promise<void> {
  const loaded = await loadApiConfig(options.configPath);
  console.log(`Loaded ${loaded.endpoints.length} endpoints from ${loaded.path}`);
  for (const endpoint of loaded.endpoints) {
    console.log(`${endpoint.id}\t${endpoint.baseUrl}`);
  }
}
