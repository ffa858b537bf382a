import path from "path";
import { describe, expect, it } from "vitest";
import { getBffRootDir, loadConfig } from "./env.js";

describe("loadConfig", () => {
  it("fills in defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      todosApiBaseUrl: "https://jsonplaceholder.typicode.com",
      profileApiBaseUrl: null,
      fixturesDir: path.join(getBffRootDir(), "data"),
    });
  });

  it("reads every variable and trims trailing slashes", () => {
    const config = loadConfig({
      PORT: "8080",
      TODOS_API_BASE_URL: "https://todos.test/",
      PROFILE_API_BASE_URL: "https://auth.test/oauth/",
      FIXTURES_DIR: "/srv/fixtures",
    });

    expect(config).toEqual({
      port: 8080,
      todosApiBaseUrl: "https://todos.test",
      profileApiBaseUrl: "https://auth.test/oauth",
      fixturesDir: path.resolve("/srv/fixtures"),
    });
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ PROFILE_API_BASE_URL: "", TODOS_API_BASE_URL: "  " });
    expect(config.profileApiBaseUrl).toBeNull();
    expect(config.todosApiBaseUrl).toBe("https://jsonplaceholder.typicode.com");
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(
      "Invalid environment: PORT: Number must be less than or equal to 65535"
    );
  });

  it("rejects a malformed URL", () => {
    expect(() => loadConfig({ PROFILE_API_BASE_URL: "not a url" })).toThrow(
      "Invalid environment: PROFILE_API_BASE_URL: Invalid url"
    );
  });
});
