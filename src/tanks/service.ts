/**
 * Tanks Module - Service Layer
 *
 * Discovery: fetch the apparatus list through an authenticated session
 * and reduce it to the selected propane tanks keyed by id.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  formatSessionError,
  type SessionClient,
  type SessionError,
} from "../session/index.js";
import type { DiscoverOptions, TankIndex } from "./schema.js";
import { indexTanksById, parseTanks, selectTanks } from "./transform.js";

const log = createLogger("tanks");

/**
 * Discover propane tanks on the account.
 *
 * @returns Tanks keyed by apparatus id, or the session error unchanged
 */
export async function discoverTanks(
  client: Pick<SessionClient, "listApparatus">,
  options: DiscoverOptions = {},
): Promise<Result<TankIndex, SessionError>> {
  const listed = await client.listApparatus();
  if (listed.isErr()) {
    log.warn({ error: formatSessionError(listed.error) }, "Discovery failed");
    return err(listed.error);
  }

  const tanks = parseTanks(listed.value);
  const selected = selectTanks(tanks, options.selectedIds ?? []);
  const index = indexTanksById(selected);

  log.debug(
    {
      apparatus: listed.value.length,
      tanks: tanks.length,
      selected: index.size,
    },
    "Discovered tanks",
  );

  return ok(index);
}
