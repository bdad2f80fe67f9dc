/**
 * Tests for provisioning URI construction
 */

import { InMemoryDirectory, type Token } from "@otptoken/common";
import { buildProvisioningUri, quoteLabel, resolveIssuer } from "./uri";

const logger = {
  error: vi.fn(),
  warn: vi.fn(),
  notice: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
};

const base = {
  id: "abc",
  key: new Uint8Array(20),
  algorithm: "sha1" as const,
  digits: 6 as const,
  disabled: false,
  managedBy: [],
  info: {},
};

describe("buildProvisioningUri", () => {
  it("should build a TOTP URI", () => {
    const token: Token = { ...base, type: "totp", clockOffset: 0, timeStep: 30 };
    expect(buildProvisioningUri(token, "EXAMPLE.COM")).toBe(
      "otpauth://totp/EXAMPLE.COM:abc?issuer=EXAMPLE.COM" +
        "&secret=AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA&digits=6&algorithm=SHA1&period=30",
    );
  });

  it("should build a HOTP URI with its counter", () => {
    const token: Token = {
      ...base,
      type: "hotp",
      algorithm: "sha256",
      digits: 8,
      counter: 42,
    };
    expect(buildProvisioningUri(token, "EXAMPLE.COM")).toBe(
      "otpauth://hotp/EXAMPLE.COM:abc?issuer=EXAMPLE.COM" +
        "&secret=AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA&digits=8&algorithm=SHA256&counter=42",
    );
  });

  it("should percent-encode the label and form-encode parameters", () => {
    const token: Token = {
      ...base,
      id: "my token/1",
      type: "totp",
      clockOffset: 0,
      timeStep: 60,
    };
    expect(buildProvisioningUri(token, "alice@EXAMPLE.COM")).toBe(
      "otpauth://totp/alice@EXAMPLE.COM:my%20token/1?issuer=alice%40EXAMPLE.COM" +
        "&secret=AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA&digits=6&algorithm=SHA1&period=60",
    );
  });
});

describe("quoteLabel", () => {
  it("should keep unreserved characters and slashes", () => {
    expect(quoteLabel("a-b_c.d~e/f")).toBe("a-b_c.d~e/f");
  });

  it("should escape reserved and sub-delimiter characters", () => {
    expect(quoteLabel("it's (my)*token!")).toBe("it%27s%20%28my%29%2Atoken%21");
    expect(quoteLabel("a:b@c?d")).toBe("a%3Ab%40c%3Fd");
  });
});

describe("resolveIssuer", () => {
  const conf = { realm: "EXAMPLE.COM", issuerAttribute: "principalName" };
  let directory: InMemoryDirectory;

  beforeEach(() => {
    vi.clearAllMocks();
    directory = new InMemoryDirectory();
  });

  it("should use the owner's principal name", async () => {
    const owner = directory.addUser("alice", { principalName: "alice@EXAMPLE.COM" });
    expect(await resolveIssuer(directory, conf, logger, owner)).toBe("alice@EXAMPLE.COM");
  });

  it("should fall back on the realm without owner", async () => {
    expect(await resolveIssuer(directory, conf, logger)).toBe("EXAMPLE.COM");
  });

  it("should fall back on the realm when the attribute is missing", async () => {
    const owner = directory.addUser("bob");
    expect(await resolveIssuer(directory, conf, logger, owner)).toBe("EXAMPLE.COM");
  });

  it("should fall back on the realm when the lookup fails", async () => {
    const owner = directory.addUser("alice", { principalName: "alice@EXAMPLE.COM" });
    vi.spyOn(directory, "lookupAttribute").mockRejectedValue(new Error("timeout"));

    expect(await resolveIssuer(directory, conf, logger, owner)).toBe("EXAMPLE.COM");
    expect(logger.debug).toHaveBeenCalledWith(
      `Unable to read principalName of ${owner}: Error: timeout`,
    );
  });
});
