import { describe, expect, it } from "vitest";
import {
  EncryptionAlgorithm,
  ErrorCode,
  HashAlgorithm,
  MessageType,
} from "./constants.js";
import { ProtocolError } from "./errors.js";
import { formatRequestLine, parseRequestLine } from "./requestLine.js";

function codeOf(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProtocolError) return err.code;
    throw err;
  }
  return undefined;
}

describe("parseRequestLine", () => {
  it("parses a plain request line", () => {
    const line = parseRequestLine("GNTP/1.0 NOTIFY NONE");
    expect(line.version).toBe("1.0");
    expect(line.messageType).toBe(MessageType.NOTIFY);
    expect(line.encryption.algorithm).toBe(EncryptionAlgorithm.NONE);
    expect(line.encryption.iv.length).toBe(0);
    expect(line.auth).toBeUndefined();
  });

  it("ignores trailing whitespace", () => {
    expect(parseRequestLine("GNTP/1.0 REGISTER NONE   ").messageType).toBe(
      MessageType.REGISTER
    );
  });

  it("parses encryption IV and auth field", () => {
    const line = parseRequestLine(
      "GNTP/1.0 NOTIFY AES:000102030405060708090A0B0C0D0E0F SHA256:ABCD.0102"
    );
    expect(line.encryption.algorithm).toBe(EncryptionAlgorithm.AES);
    expect(line.encryption.iv).toEqual(
      Buffer.from("000102030405060708090a0b0c0d0e0f", "hex")
    );
    expect(line.auth).toEqual({
      algorithm: HashAlgorithm.SHA256,
      hash: "ABCD",
      salt: "0102",
    });
  });

  it("accepts 3DES as an algorithm name", () => {
    const line = parseRequestLine("GNTP/1.0 SUBSCRIBE 3DES:0001020304050607 MD5:AA.BB");
    expect(line.encryption.algorithm).toBe(EncryptionAlgorithm.TRIPLE_DES);
    expect(line.encryption.iv.length).toBe(8);
  });

  it("reports a foreign protocol before anything else", () => {
    expect(codeOf(() => parseRequestLine("HTTP/1.0 NOTIFY NONE"))).toBe(
      ErrorCode.UNKNOWN_PROTOCOL
    );
    expect(codeOf(() => parseRequestLine("HTTP/1.0 BOGUS NONE"))).toBe(
      ErrorCode.UNKNOWN_PROTOCOL
    );
  });

  it("reports an unsupported version", () => {
    expect(codeOf(() => parseRequestLine("GNTP/2.0 NOTIFY NONE"))).toBe(
      ErrorCode.UNKNOWN_PROTOCOL_VERSION
    );
  });

  it("rejects malformed lines as invalid requests", () => {
    const lines = [
      "GNTP/1.0 NOTIFY",
      "GNTP/1.0 NOTIFY NONE MD5:AA.BB extra",
      "GNTP1.0 NOTIFY NONE",
      "GNTP/1.0 PING NONE",
      "GNTP/1.0 NOTIFY BLOWFISH",
      "GNTP/1.0 NOTIFY AES:XYZ",
      "GNTP/1.0 NOTIFY NONE CRC32:AA.BB",
    ];
    for (const line of lines) {
      expect(codeOf(() => parseRequestLine(line))).toBe(ErrorCode.INVALID_REQUEST);
    }
  });

  it("rejects an unparsable hash as not authorized", () => {
    expect(codeOf(() => parseRequestLine("GNTP/1.0 NOTIFY NONE SHA256:ABCD"))).toBe(
      ErrorCode.NOT_AUTHORIZED
    );
    expect(codeOf(() => parseRequestLine("GNTP/1.0 NOTIFY NONE SHA256:.AB"))).toBe(
      ErrorCode.NOT_AUTHORIZED
    );
    expect(codeOf(() => parseRequestLine("GNTP/1.0 NOTIFY NONE SHA256"))).toBe(
      ErrorCode.NOT_AUTHORIZED
    );
  });
});

describe("formatRequestLine", () => {
  it("writes IV and auth fields in upper-case hex", () => {
    expect(
      formatRequestLine({
        version: "1.0",
        messageType: MessageType.NOTIFY,
        encryption: { algorithm: EncryptionAlgorithm.AES, iv: Buffer.from([0xab, 0x01]) },
        auth: { algorithm: HashAlgorithm.MD5, hash: "AA", salt: "BB" },
      })
    ).toBe("GNTP/1.0 NOTIFY AES:AB01 MD5:AA.BB");
  });

  it("omits the IV for NONE", () => {
    expect(
      formatRequestLine({
        version: "1.0",
        messageType: MessageType.REGISTER,
        encryption: { algorithm: EncryptionAlgorithm.NONE, iv: Buffer.alloc(0) },
      })
    ).toBe("GNTP/1.0 REGISTER NONE");
  });
});
