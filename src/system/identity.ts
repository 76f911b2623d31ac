import { execa } from "execa";

import { ConfigError } from "../core/errors.js";

export type Ownership = { uid: number; gid: number };

const NUMERIC_ID = /^\d+$/;

/**
 * Resolve account names to numeric ids. Numeric strings pass through;
 * names go through `id -u` and `getent group`.
 */
export async function resolveOwnership(
  owner: string | null,
  group: string | null,
): Promise<Ownership | null> {
  if (owner === null && group === null) return null;

  const uid = owner === null ? -1 : await resolveUserId(owner);
  const gid = group === null ? -1 : await resolveGroupId(group);
  return { uid, gid };
}

export async function resolveUserId(user: string): Promise<number> {
  if (NUMERIC_ID.test(user)) return Number(user);

  const res = await execa("id", ["-u", user], { reject: false, stdio: "pipe" });
  const field = res.stdout.trim();
  if (res.exitCode !== 0 || !NUMERIC_ID.test(field)) {
    throw new ConfigError(`Unknown user "${user}" for artifact ownership.`);
  }
  return Number(field);
}

export async function resolveGroupId(group: string): Promise<number> {
  if (NUMERIC_ID.test(group)) return Number(group);

  // getent prints "name:password:gid:members".
  const res = await execa("getent", ["group", group], { reject: false, stdio: "pipe" });
  const field = res.stdout.trim().split(":")[2] ?? "";
  if (res.exitCode !== 0 || !NUMERIC_ID.test(field)) {
    throw new ConfigError(`Unknown group "${group}" for artifact ownership.`);
  }
  return Number(field);
}
