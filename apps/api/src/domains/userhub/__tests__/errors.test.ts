import { DependencyUnavailableError, isProfileNotFound, ProfileNotFoundError } from "../errors.js";

describe("DependencyUnavailableError", () => {
  it("names the dependency and the cause", () => {
    const cause = new Error("connection refused");
    const error = new DependencyUnavailableError("game.campaigns", cause);

    expect(error.message).toBe("game.campaigns unavailable: connection refused");
    expect(error.dependency).toBe("game.campaigns");
    expect(error.cause).toBe(cause);
  });

  it("omits the cause when there is none", () => {
    expect(new DependencyUnavailableError("game.invites").message).toBe("game.invites unavailable");
  });

  it("uses a generic message without a dependency name", () => {
    expect(new DependencyUnavailableError("  ", new Error("x")).message).toBe("dependency unavailable");
  });
});

describe("isProfileNotFound", () => {
  it("recognizes the error directly and through a cause", () => {
    expect(isProfileNotFound(new ProfileNotFoundError())).toBe(true);
    expect(isProfileNotFound(new Error("lookup failed", { cause: new ProfileNotFoundError() }))).toBe(true);
    expect(isProfileNotFound(new Error("user profile not found"))).toBe(false);
    expect(isProfileNotFound(null)).toBe(false);
  });
});
