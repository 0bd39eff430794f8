import crypto from "node:crypto";

// ── Request utilities ───────────────────────────────────────────

interface RequestWithId {
  requestId?: string;
  id?: string;
}

export function requestIdOf(request: RequestWithId): string {
  return String(request?.requestId || request?.id || "unknown");
}

export function resolveRequestId(header: string | string[] | undefined): string {
  const raw = Array.isArray(header) ? header[0] : header;
  const value = String(raw || "").trim();
  if (value && value.length <= 128) return value;
  return crypto.randomUUID();
}

export function headerText(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? value[0] : value;
  return String(raw ?? "").trim();
}

// ── Date utilities ──────────────────────────────────────────────

export function toDate(value: unknown, fallback: Date | null = null): Date | null {
  if (!value) return fallback;
  let date: Date;
  if (value instanceof Date) date = value;
  else if (typeof value === "string" || typeof value === "number") date = new Date(value);
  else return fallback;
  return Number.isFinite(date.getTime()) ? date : fallback;
}

export function toIso(value: unknown): string | null {
  const date = toDate(value);
  return date ? date.toISOString() : null;
}
