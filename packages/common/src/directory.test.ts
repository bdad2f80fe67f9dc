/**
 * Tests for the in-memory directory
 */

import { InMemoryDirectory } from "./directory";
import { DuplicateEntryError, NotFoundError } from "./errors";

describe("InMemoryDirectory", () => {
  let directory: InMemoryDirectory;

  beforeEach(() => {
    directory = new InMemoryDirectory();
  });

  describe("records", () => {
    it("should create and read a record with its object classes", async () => {
      const id = await directory.createRecord(["otpToken", "otpTokenTOTP"], {
        tokenUniqueId: "t1",
        description: "desk token",
      });

      expect(id).toBe("t1");
      expect(await directory.readRecord("t1")).toEqual({
        tokenUniqueId: "t1",
        description: "desk token",
        objectClass: ["otpToken", "otpTokenTOTP"],
      });
    });

    it("should refuse duplicate ids", async () => {
      await directory.createRecord(["otpToken"], { tokenUniqueId: "t1" });
      await expect(
        directory.createRecord(["otpToken"], { tokenUniqueId: "t1" }),
      ).rejects.toBeInstanceOf(DuplicateEntryError);
    });

    it("should not share values with callers", async () => {
      const key = new Uint8Array([1, 2, 3, 4, 5]);
      await directory.createRecord(["otpToken"], {
        tokenUniqueId: "t1",
        tokenOTPKey: key,
      });
      key[0] = 9;

      const record = await directory.readRecord("t1");
      expect(record.tokenOTPKey).toEqual(new Uint8Array([1, 2, 3, 4, 5]));
    });

    it("should apply and remove attributes on update", async () => {
      await directory.createRecord(["otpToken"], {
        tokenUniqueId: "t1",
        tokenVendor: "Acme",
        tokenModel: "X1",
      });

      const updated = await directory.updateRecord("t1", {
        tokenVendor: null,
        tokenSerial: "0042",
      });

      expect(updated).toEqual({
        tokenUniqueId: "t1",
        tokenModel: "X1",
        tokenSerial: "0042",
        objectClass: ["otpToken"],
      });
    });

    it("should report unknown ids", async () => {
      await expect(directory.readRecord("missing")).rejects.toThrow(
        "missing: OTP token not found",
      );
      await expect(directory.updateRecord("missing", {})).rejects.toBeInstanceOf(
        NotFoundError,
      );
      await expect(directory.deleteRecord("missing")).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });

    it("should delete records", async () => {
      await directory.createRecord(["otpToken"], { tokenUniqueId: "t1" });
      await directory.deleteRecord("t1");
      expect(directory.size).toBe(0);
    });
  });

  describe("search", () => {
    beforeEach(async () => {
      await directory.createRecord(["otpToken", "otpTokenTOTP"], {
        tokenUniqueId: "t1",
        description: "phone",
      });
      await directory.createRecord(["otpToken", "otpTokenHOTP"], {
        tokenUniqueId: "h1",
        description: "key fob",
      });
    });

    it("should filter records", async () => {
      const entries = await directory.search("(objectClass=otpTokenHOTP)");
      expect(entries.map((e) => e.tokenUniqueId)).toEqual(["h1"]);
    });

    it("should restrict returned attributes", async () => {
      const entries = await directory.search("(objectClass=otpToken)", [
        "tokenUniqueId",
      ]);
      expect(entries).toEqual([{ tokenUniqueId: "t1" }, { tokenUniqueId: "h1" }]);
    });
  });

  describe("identities", () => {
    it("should resolve users to references and back", async () => {
      directory.addUser("jdoe");

      const reference = await directory.resolveIdentity("jdoe");
      expect(reference).toBe("uid=jdoe,cn=users,cn=accounts,dc=example,dc=com");
      expect(await directory.identifierOf(reference)).toBe("jdoe");
    });

    it("should report unknown users", async () => {
      await expect(directory.resolveIdentity("nobody")).rejects.toThrow(
        "nobody: user not found",
      );
    });

    it("should fall back on the RDN value for unknown references", async () => {
      expect(await directory.identifierOf("uid=gone,cn=users,dc=x")).toBe("gone");
    });

    it("should look up principal attributes", async () => {
      const reference = directory.addUser("jdoe", {
        principalName: "jdoe@EXAMPLE.COM",
      });

      expect(await directory.lookupAttribute(reference, "principalName")).toBe(
        "jdoe@EXAMPLE.COM",
      );
      expect(await directory.lookupAttribute(reference, "mail")).toBeUndefined();
      await expect(
        directory.lookupAttribute("uid=ghost,dc=x", "principalName"),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
