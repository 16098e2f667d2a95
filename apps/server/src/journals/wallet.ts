import { InvalidInputError } from "../errors";

const HEX_40 = /^[0-9a-fA-F]{40}$/;

/** `0x`-prefixed or bare 40-hex-digit address. No checksum validation. */
export function isValidEthereumAddress(address: string | null | undefined): boolean {
  if (!address) return false;
  const body = address.startsWith("0x") ? address.slice(2) : address;
  return HEX_40.test(body);
}

export function assertWalletAddress(address: string | null | undefined): string {
  const trimmed = address?.trim() ?? "";
  if (!isValidEthereumAddress(trimmed)) {
    throw new InvalidInputError(
      "Invalid wallet address. Expected 40 hexadecimal characters, optionally prefixed with 0x.",
    );
  }
  return trimmed;
}
