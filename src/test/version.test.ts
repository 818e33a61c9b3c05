import { describe, it } from "node:test";
import assert from "node:assert";
import { extractIosVersion, recoverVersion } from "../tools/version";

describe("extractIosVersion", () => {
  it("should read IOS XE banners", () => {
    assert.strictEqual(
      extractIosVersion("Cisco IOS XE Software, Version 17.3.2, RELEASE SOFTWARE (fc2)"),
      "17.3.2",
    );
  });

  it("should read classic IOS banners", () => {
    const raw =
      "Cisco IOS Software, IOSv Software (VIOS-ADVENTERPRISEK9-M), Version 15.9(3)M4, RELEASE SOFTWARE (fc3)";
    assert.strictEqual(extractIosVersion(raw), "15.9(3)M4");
  });

  it("should fall back to a bare Version token", () => {
    assert.strictEqual(extractIosVersion("ROM: Bootstrap program\nVersion 16.12.4 \nuptime"), "16.12.4");
  });

  it("should be case-insensitive", () => {
    assert.strictEqual(extractIosVersion("cisco ios xe software, version 17.9.1a"), "17.9.1a");
  });

  it("should return null when nothing matches", () => {
    assert.strictEqual(extractIosVersion(""), null);
    assert.strictEqual(extractIosVersion("uptime is 1 day, 2 hours"), null);
  });
});

describe("recoverVersion", () => {
  it("should fill a missing version from raw output", () => {
    const input = {
      parsed: { hostname: "R1" },
      raw: "Cisco IOS XE Software, Version 17.3.2, RELEASE",
    };
    const output = recoverVersion(input);
    assert.deepStrictEqual(output.parsed, { hostname: "R1", version: "17.3.2" });
    assert.deepStrictEqual(input.parsed, { hostname: "R1" });
  });

  it("should keep an existing version", () => {
    const input = { parsed: { version: "15.2" }, raw: "Cisco IOS XE Software, Version 17.3.2" };
    assert.strictEqual(recoverVersion(input), input);
  });

  it("should leave non-mapping parsed values alone", () => {
    const input = { parsed: null, raw: "Cisco IOS XE Software, Version 17.3.2" };
    assert.strictEqual(recoverVersion(input), input);
  });

  it("should leave the data alone when raw has no version", () => {
    const input = { parsed: { version: "  " }, raw: "no banner here" };
    assert.strictEqual(recoverVersion(input), input);
  });
});
