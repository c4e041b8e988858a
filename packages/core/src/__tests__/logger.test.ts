import { describe, it, expect } from "vitest";
import { createLogger, moduleLogger } from "../logger.js";

describe("logger", () => {
  it("takes the requested level", () => {
    expect(createLogger("silent").level).toBe("silent");
    expect(createLogger("debug").level).toBe("debug");
  });

  it("binds the module name on child loggers", () => {
    expect(moduleLogger("router").bindings()).toEqual({ name: "chat-storefront", module: "router" });
  });
});
