import { describe, it, expect } from "vitest";
import { loadEnvConfig } from "../src/shared/env_config.js";

describe("loadEnvConfig", () => {
  it("applies defaults when nothing is set", () => {
    expect(loadEnvConfig({})).toEqual({ JAVA_BIN: "java", SPRING_PROFILE: "dbcp" });
  });

  it("reads and trims the importer settings", () => {
    const config = loadEnvConfig({
      PORTAL_HOME: " /opt/portal ",
      IMPORTER_JAR: "/opt/portal/core.jar",
      JAVA_BIN: "/usr/lib/jvm/bin/java",
      SPRING_PROFILE: "dbcp",
      UNRELATED: "x",
    });
    expect(config).toEqual({
      PORTAL_HOME: "/opt/portal",
      IMPORTER_JAR: "/opt/portal/core.jar",
      JAVA_BIN: "/usr/lib/jvm/bin/java",
      SPRING_PROFILE: "dbcp",
    });
  });

  it("treats blank values as unset", () => {
    expect(loadEnvConfig({ PORTAL_HOME: "  ", SPRING_PROFILE: "" })).toEqual({
      JAVA_BIN: "java",
      SPRING_PROFILE: "dbcp",
    });
  });
});
