export const DEPENDENCY_CAMPAIGNS = "game.campaigns";
export const DEPENDENCY_INVITES = "game.invites";
export const DEPENDENCY_PROFILE = "social.profile";
export const DEPENDENCY_NOTIFICATIONS = "notifications.unread";

export type UserHubErrorCode =
  | "user_id_required"
  | "service_not_configured"
  | "campaign_gateway_not_configured"
  | "profile_gateway_not_configured"
  | "notification_gateway_not_configured";

export class UserHubError extends Error {
  code: UserHubErrorCode;

  constructor(code: UserHubErrorCode, message: string) {
    super(message);
    this.name = "UserHubError";
    this.code = code;
  }
}

/** Caller identity is missing; never retried. */
export class InputError extends UserHubError {
  constructor(code: UserHubErrorCode, message: string) {
    super(code, message);
    this.name = "InputError";
  }
}

/** A required collaborator was not wired; a deployment defect. */
export class ConfigurationError extends UserHubError {
  constructor(code: UserHubErrorCode, message: string) {
    super(code, message);
    this.name = "ConfigurationError";
  }
}

/**
 * A critical upstream dependency failed and no stale snapshot could stand in
 * for it. Callers must not receive fabricated summary data instead.
 */
export class DependencyUnavailableError extends Error {
  dependency: string;

  constructor(dependency: string, cause?: unknown) {
    super(dependencyMessage(dependency, cause), cause === undefined ? undefined : { cause });
    this.name = "DependencyUnavailableError";
    this.dependency = dependency;
  }
}

function dependencyMessage(dependency: string, cause: unknown): string {
  const name = String(dependency || "").trim();
  if (!name) return "dependency unavailable";
  if (cause === undefined || cause === null) return `${name} unavailable`;
  const detail = cause instanceof Error ? cause.message : String(cause);
  return `${name} unavailable: ${detail}`;
}

/** Business state, not a failure: the user has no social profile yet. */
export class ProfileNotFoundError extends Error {
  constructor(message = "user profile not found") {
    super(message);
    this.name = "ProfileNotFoundError";
  }
}

export function isProfileNotFound(error: unknown): boolean {
  if (error instanceof ProfileNotFoundError) return true;
  return error instanceof Error && error.cause instanceof ProfileNotFoundError;
}
