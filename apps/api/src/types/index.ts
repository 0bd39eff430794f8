// ── Logger ─────────────────────────────────────────────────────

export type { Logger } from "@userhub/shared-types";
