export const PROTOCOL_VERSION = "1.0";

// Framing
export const FRAME_HEADER_BYTES = 4; // big-endian u32 payload length
export const MAX_MESSAGE_BYTES = 64 * 1024; // largest payload the server accepts from a client
export const MAX_SNAPSHOT_BYTES = 8 * 1024 * 1024; // largest payload a client accepts from the server

// Simulation
export const DEFAULT_TICK_RATE = 30; // Hz

// Player names
export const NAME_MIN_LENGTH = 3;
export const NAME_MAX_LENGTH = 20;
export const NAME_PATTERN = /^[A-Za-z0-9_\-. ]+$/;
export const NAME_SUGGESTION_COUNT = 3;

// Handshake
export const USERNAME_RETRIES = 1; // extra connect attempts after a name collision

export const SKILL_NAMES = ["push", "pull"] as const;
export type SkillName = (typeof SKILL_NAMES)[number];

export const DEFAULT_TCP_PORT = 5555;
export const DEFAULT_WS_PORT = 3000;
export const DEFAULT_HTTP_PORT = 3001;
