"use strict";

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const byteToHex = (byteValue: number): string => byteValue.toString(16).padStart(2, "0");

// Space-separated byte pairs in storage order, e.g. "de ad be ef".
export const bytesToSpacedHex = (bytes: Uint8Array): string => Array.from(bytes, byteToHex).join(" ");

export const bytesToHex = (bytes: Uint8Array): string => Array.from(bytes, byteToHex).join("");

export const chunkSpacedHex = (spacedHex: string, bytesPerRow: number): string[] => {
  if (!spacedHex) return [];
  const pairs = spacedHex.split(" ");
  const rows: string[] = [];
  for (let index = 0; index < pairs.length; index += bytesPerRow) {
    rows.push(pairs.slice(index, index + bytesPerRow).join(" "));
  }
  return rows;
};

export const stripTrailingNuls = (text: string): string => text.replace(/\0+$/u, "");
