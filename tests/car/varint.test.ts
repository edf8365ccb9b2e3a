import { describe, it } from "mocha";
import { expect } from "chai";

import { decodeVarint, encodeVarint } from "../../src/car/varint.js";

describe("car/varint", () => {
  it("decodes single and multi-byte values", () => {
    expect(decodeVarint(Uint8Array.of(0x00))).to.deep.equal({ value: 0, length: 1 });
    expect(decodeVarint(Uint8Array.of(0x7f, 0xff))).to.deep.equal({ value: 127, length: 1 });
    expect(decodeVarint(Uint8Array.of(0x80, 0x01))).to.deep.equal({ value: 128, length: 2 });
    expect(decodeVarint(Uint8Array.of(0xac, 0x02))).to.deep.equal({ value: 300, length: 2 });
  });

  it("encodes values in little-endian 7-bit groups", () => {
    expect(Array.from(encodeVarint(0))).to.deep.equal([0x00]);
    expect(Array.from(encodeVarint(300))).to.deep.equal([0xac, 0x02]);
    expect(Array.from(encodeVarint(16_384))).to.deep.equal([0x80, 0x80, 0x01]);
  });

  it("returns null when the buffer ends before the terminating byte", () => {
    expect(decodeVarint(new Uint8Array(0))).to.equal(null);
    expect(decodeVarint(Uint8Array.of(0x80))).to.equal(null);
    expect(decodeVarint(Uint8Array.of(0xff, 0xff, 0xff))).to.equal(null);
  });

  it("rejects encodings longer than ten bytes", () => {
    const eleven = new Uint8Array(11).fill(0x80);
    eleven[10] = 0x01;
    expect(decodeVarint(eleven)).to.equal(null);
  });

  it("rejects values beyond the safe integer range", () => {
    expect(decodeVarint(encodeVarint(Number.MAX_SAFE_INTEGER))).to.deep.equal({
      value: Number.MAX_SAFE_INTEGER,
      length: 8,
    });
    // 2^53 encoded by hand: 7 groups of zero bits then 0x10 carrying bit 53.
    expect(decodeVarint(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x10))).to.equal(null);
  });

  it("refuses to encode negative or fractional values", () => {
    expect(() => encodeVarint(-1)).to.throw(RangeError);
    expect(() => encodeVarint(1.5)).to.throw(RangeError);
  });
});
