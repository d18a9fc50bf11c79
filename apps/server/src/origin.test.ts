import { describe, expect, it } from "vitest";
import { originHeaders, SOFTWARE_NAME } from "./origin.js";

describe("originHeaders", () => {
  it("names the machine and the software", () => {
    const headers = originHeaders("test-host");
    expect(headers.get("Origin-Machine-Name")).toBe("test-host");
    expect(headers.get("Origin-Software-Name")).toBe(SOFTWARE_NAME);
    expect(headers.get("Origin-Platform-Name")).toBe(process.platform);
    expect(Array.from(headers.keys())).toHaveLength(5);
  });
});
