// Query service flavors.
//
// The server query interface and the client query plugin speak the same
// protocol but differ in port, greeting length and the commands they accept.

import commands from "../data/commands.json";

export type Flavor = "server" | "client";

export interface FlavorProfile {
  readonly flavor: Flavor;
  /** Default port of the plain query interface. */
  readonly port: number;
  /** Default port of the SSH query interface, where there is one. */
  readonly sshPort: number | null;
  /** Lines the service sends before it accepts commands. */
  readonly greetingLines: number;
  readonly commandSet: ReadonlySet<string>;
}

/** The server closes query connections idle for this long. */
export const SERVER_IDLE_TIMEOUT_MS = 10 * 60 * 1000;

export const SERVER_PROFILE: FlavorProfile = {
  flavor: "server",
  port: 10011,
  sshPort: 10022,
  greetingLines: 2,
  commandSet: new Set(commands.server),
};

export const CLIENT_PROFILE: FlavorProfile = {
  flavor: "client",
  port: 25639,
  sshPort: null,
  greetingLines: 4,
  commandSet: new Set(commands.client),
};

export function profileFor(flavor: Flavor): FlavorProfile {
  return flavor === "server" ? SERVER_PROFILE : CLIENT_PROFILE;
}
