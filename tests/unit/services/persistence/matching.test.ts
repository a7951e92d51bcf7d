import { describe, expect, it } from "vitest";

import {
  getDomainFromEmail,
  getInitials,
  isIspDomain,
  pickMatch,
  shortenDomain,
} from "../../../../src/services/persistence/matching.js";

describe("matching", () => {
  describe("getDomainFromEmail", () => {
    it("should return the lower-cased domain", () => {
      expect(getDomainFromEmail("Jane@Example.COM")).toBe("example.com");
      expect(getDomainFromEmail("  ops@mail.acme.co.uk ")).toBe("mail.acme.co.uk");
    });

    it("should reject malformed addresses", () => {
      expect(getDomainFromEmail("no-at-sign.com")).toBeNull();
      expect(getDomainFromEmail("@example.com")).toBeNull();
      expect(getDomainFromEmail("a@b@example.com")).toBeNull();
      expect(getDomainFromEmail("user@localhost")).toBeNull();
      expect(getDomainFromEmail("user@.com")).toBeNull();
    });
  });

  describe("isIspDomain", () => {
    it("should recognise free-mail providers case-insensitively", () => {
      expect(isIspDomain("Gmail.com")).toBe(true);
      expect(isIspDomain("acme.com")).toBe(false);
    });
  });

  describe("shortenDomain", () => {
    it("should drop TLD and country-code labels", () => {
      expect(shortenDomain("acme.com")).toBe("acme");
      expect(shortenDomain("mail.acme.co.uk")).toBe("acme");
      expect(shortenDomain("example.io.")).toBe("example");
    });

    it("should keep a single label", () => {
      expect(shortenDomain("com")).toBe("com");
    });
  });

  describe("getInitials", () => {
    it("should take the first letter of every word", () => {
      expect(getInitials("International Business Machines")).toBe("IBM");
      expect(getInitials("Acme")).toBe("A");
    });
  });

  describe("pickMatch", () => {
    it("should pick a name equal to the shortened domain", () => {
      expect(pickMatch("Acme Corp", "acme.com", ["Globex", "Acme"])).toBe(1);
    });

    it("should pick a name whose initials equal the domain", () => {
      expect(
        pickMatch("International Business Machines", "ibm.com", [
          "Intl Foo",
          "International Business Machines",
        ])
      ).toBe(1);
    });

    it("should pick the single name matching the company words", () => {
      expect(
        pickMatch("Globex Corporation", "globex-mail.com", ["Globex Corporation"])
      ).toBe(0);
    });

    it("should return null when more than one name is nominated", () => {
      expect(
        pickMatch("Acme", "acme.com", ["Acme Labs", "Acme Systems"])
      ).toBeNull();
    });

    it("should return null when nothing matches", () => {
      expect(pickMatch("Acme", "acme.com", ["Globex"])).toBeNull();
    });

    it("should ignore empty candidate names", () => {
      expect(pickMatch("Acme", "acme.com", [null, " ", "Acme"])).toBe(2);
    });

    it("should not match a company name shorter than two characters", () => {
      expect(pickMatch("A", "a.com", ["A"])).toBeNull();
    });
  });
});
