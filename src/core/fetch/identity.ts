import UserAgent from "user-agents";

export type IdentityStrategy = "rotate" | "random";

export interface IdentityPool {
  readonly size: number;
  readonly userAgents: readonly string[];
  /**
   * Pick the user-agent for one request attempt. `rotate` walks the pool so
   * that a retry never repeats the identity of the attempt before it.
   */
  pick(pageNumber: number, attempt: number): string;
}

export interface IdentityPoolOptions {
  userAgents?: readonly string[];
  /** Number of identities generated when no explicit list is given. */
  size?: number;
  strategy?: IdentityStrategy;
  random?: () => number;
}

export const generateUserAgents = (count: number): string[] =>
  Array.from({ length: count }, () =>
    new UserAgent({ deviceCategory: "desktop" }).toString(),
  );

export const createIdentityPool = (
  options: IdentityPoolOptions = {},
): IdentityPool => {
  const configured = (options.userAgents ?? [])
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  const userAgents = Object.freeze(
    configured.length > 0 ? configured : generateUserAgents(options.size ?? 5),
  );

  if (userAgents.length === 0) {
    throw new RangeError("Identity pool needs at least one user-agent");
  }

  const strategy = options.strategy ?? "random";
  const random = options.random ?? Math.random;

  const pick = (pageNumber: number, attempt: number): string => {
    const index =
      strategy === "rotate"
        ? (pageNumber - 1 + attempt - 1) % userAgents.length
        : Math.floor(random() * userAgents.length) % userAgents.length;
    return userAgents[Math.max(0, index)];
  };

  return { size: userAgents.length, userAgents, pick };
};
