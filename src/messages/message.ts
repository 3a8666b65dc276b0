/**
 * Platform-neutral message shape handed to view resolvers. Channel adapters
 * build it from their own payloads; views never see channel-specific types.
 */
export type ChannelUser = {
  readonly id: number | string;
  /** Human-readable identity used in log lines. */
  readonly displayName: string;
};

export type Message<TUser extends ChannelUser = ChannelUser> = {
  readonly id: number | string;
  readonly platform: string;
  readonly text: string;
  readonly user: TUser;
  /** Unix time in seconds, as reported by the platform. */
  readonly timestamp: number;
  /** Untouched source payload, kept for tracing. */
  readonly raw: unknown;
};
