// Typed aliases for frequently-used identifiers to make intent explicit.
export type GuildId = string;
export type ChannelId = string;
export type MessageId = string;
