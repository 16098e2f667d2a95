import { describe, it, expect } from "vitest";

import { InvalidInputError } from "../../errors";
import { assertWalletAddress, isValidEthereumAddress } from "../wallet";

const HEX = "ab".repeat(20);

describe("wallet addresses", () => {
  it("accepts 40 hex digits with or without 0x", () => {
    expect(isValidEthereumAddress(`0x${HEX}`)).toBe(true);
    expect(isValidEthereumAddress(HEX.toUpperCase())).toBe(true);
  });

  it("rejects other shapes", () => {
    expect(isValidEthereumAddress(`0x${HEX}0`)).toBe(false);
    expect(isValidEthereumAddress(`0x${HEX.slice(1)}g`)).toBe(false);
    expect(isValidEthereumAddress("")).toBe(false);
    expect(isValidEthereumAddress(undefined)).toBe(false);
  });

  it("trims before validating", () => {
    expect(assertWalletAddress(`  0x${HEX} `)).toBe(`0x${HEX}`);
    expect(() => assertWalletAddress("0x123")).toThrow(InvalidInputError);
  });
});
