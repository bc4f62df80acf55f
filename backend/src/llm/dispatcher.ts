import type { ProviderRole, ResultSet } from "../types";
import type { ProviderClient } from "./client";
import { failedResult } from "./client";

export type DispatchClients = Record<ProviderRole, ProviderClient>;

/**
 * Calls both providers concurrently and waits for both. A client that breaks
 * its contract and rejects still fills its slot with an error result.
 */
export async function dispatch(prompt: string, clients: DispatchClients): Promise<ResultSet> {
  const startedAt = Date.now();
  const settle = (client: ProviderClient) =>
    client.call(prompt).catch((err: unknown) => failedResult(client.provider, client.model, err, Date.now() - startedAt));

  const [primaryA, primaryB] = await Promise.all([settle(clients.primaryA), settle(clients.primaryB)]);
  return { primaryA, primaryB };
}
