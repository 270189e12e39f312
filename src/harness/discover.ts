import { opendirSync, type Dir } from "node:fs";
import { join } from "node:path";
import { DiscoveryError } from "../contracts";

function* walkEntries(handle: Dir, dir: string, marker: string): Generator<string, void, undefined> {
  try {
    for (let entry = handle.readSync(); entry !== null; entry = handle.readSync()) {
      if (entry.isDirectory()) continue;
      if (!entry.name.includes(marker)) continue;
      yield join(dir, entry.name);
    }
  } finally {
    handle.closeSync();
  }
}

/**
 * Lists `dir` once and lazily yields the path of every non-directory entry whose
 * name contains `marker`. Order is whatever the filesystem enumerates.
 *
 * The directory is opened eagerly so an unreadable directory surfaces as a
 * DiscoveryError from this call rather than from the first iteration.
 */
export function discoverFixtures(dir: string, marker: string): Iterable<string> {
  let handle: Dir;
  try {
    handle = opendirSync(dir);
  } catch (error) {
    throw new DiscoveryError(dir, error);
  }
  return walkEntries(handle, dir, marker);
}
