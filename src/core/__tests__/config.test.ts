import { describe, it, expect } from "vitest";
import { getDefaultConfig, loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual(getDefaultConfig());
    expect(getDefaultConfig()).toEqual({
      rootKey: "GROOT",
      auxSuffix: ".env",
      gitMarker: ".git",
      buildCacheMarker: "_npx",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      ROOTSTAKE_KEY: " APP_ROOT ",
      ROOTSTAKE_AUX_SUFFIX: ".vars",
      ROOTSTAKE_BUILD_MARKER: "run-cache",
    });
    expect(config).toEqual({
      rootKey: "APP_ROOT",
      auxSuffix: ".vars",
      gitMarker: ".git",
      buildCacheMarker: "run-cache",
    });
  });

  it("prefers explicit options and ignores blanks", () => {
    const config = loadConfig({ ROOTSTAKE_KEY: "FROM_ENV", ROOTSTAKE_AUX_SUFFIX: "  " }, { rootKey: "EXPLICIT", gitMarker: " " });
    expect(config.rootKey).toBe("EXPLICIT");
    expect(config.auxSuffix).toBe(".env");
    expect(config.gitMarker).toBe(".git");
  });
});
