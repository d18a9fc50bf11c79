import { describe, expect, it } from "vitest";
import { EncryptionAlgorithm } from "../../../protocol/src/constants.js";
import { encrypt } from "../../../protocol/src/crypto.js";
import { DecryptionError, InvalidRequestError } from "../../../protocol/src/errors.js";
import type { CipherSpec } from "../../../protocol/src/types.js";
import { BlockReader, EndOfStreamError } from "./blockReader.js";

const cipher: CipherSpec = {
  algorithm: EncryptionAlgorithm.AES,
  iv: Buffer.alloc(16, 9),
  key: Buffer.alloc(24, 5),
};

describe("BlockReader", () => {
  it("reads lines and strips CR", async () => {
    const reader = new BlockReader();
    reader.push(Buffer.from("first\r\nsecond\nthird\r\n"));

    expect(await reader.readLine()).toBe("first");
    expect(await reader.readLine()).toBe("second");
    expect(await reader.readLine()).toBe("third");
  });

  it("waits for lines split across chunks", async () => {
    const reader = new BlockReader();
    const line = reader.readLine();

    reader.push(Buffer.from("Applica"));
    reader.push(Buffer.from("tion-Name: Test\r"));
    reader.push(Buffer.from("\n"));

    expect(await line).toBe("Application-Name: Test");
  });

  it("reads exact byte runs", async () => {
    const reader = new BlockReader();
    reader.push(Buffer.from("abcdef"));

    expect((await reader.readBytes(4)).toString()).toBe("abcd");
    expect(reader.bufferedLength).toBe(2);
  });

  it("drains buffered data before reporting end of stream", async () => {
    const reader = new BlockReader();
    reader.push(Buffer.from("last\r\npartial"));
    reader.end();

    expect(await reader.readLine()).toBe("last");
    await expect(reader.readLine()).rejects.toBeInstanceOf(EndOfStreamError);
  });

  it("fails a pending read when the stream ends", async () => {
    const reader = new BlockReader();
    const bytes = reader.readBytes(10);
    reader.push(Buffer.from("short"));
    reader.end();

    await expect(bytes).rejects.toBeInstanceOf(EndOfStreamError);
  });

  it("rejects lines over the limit", async () => {
    const reader = new BlockReader(8);
    reader.push(Buffer.from("0123456789"));

    await expect(reader.readLine()).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("finds a delimiter that straddles chunks", async () => {
    const reader = new BlockReader();
    const block = reader.readUntil(Buffer.from("\r\n\r\n"));

    reader.push(Buffer.from("data\r\n\r"));
    reader.push(Buffer.from("\nrest"));

    expect((await block).toString()).toBe("data");
    expect(reader.bufferedLength).toBe(4);
  });

  it("decrypts a header block and closes it with a blank line", async () => {
    const reader = new BlockReader();
    const ciphertext = encrypt(cipher, Buffer.from("A: 1\r\nB: 2"));
    reader.push(Buffer.concat([ciphertext, Buffer.from("\r\n\r\nNext: 3\r\n")]));

    await reader.decryptNextBlock(cipher);

    expect(await reader.readLine()).toBe("A: 1");
    expect(await reader.readLine()).toBe("B: 2");
    expect(await reader.readLine()).toBe("");
    expect(await reader.readLine()).toBe("Next: 3");
  });

  it("does not add a second blank line when the plaintext ends with one line break", async () => {
    const reader = new BlockReader();
    const ciphertext = encrypt(cipher, Buffer.from("A: 1\r\n"));
    reader.push(Buffer.concat([ciphertext, Buffer.from("\r\n\r\nNext: 3\r\n")]));

    await reader.decryptNextBlock(cipher);

    expect(await reader.readLine()).toBe("A: 1");
    expect(await reader.readLine()).toBe("");
    expect(await reader.readLine()).toBe("Next: 3");
  });

  it("reports tampered ciphertext as a decryption error", async () => {
    const reader = new BlockReader();
    const ciphertext = encrypt(cipher, Buffer.from("A: 1\r\nB: 2\r\n"));
    reader.push(Buffer.concat([ciphertext.subarray(1), Buffer.from("\r\n\r\n")]));

    await expect(reader.decryptNextBlock(cipher)).rejects.toBeInstanceOf(DecryptionError);
  });

  it("reads and decrypts a resource payload", async () => {
    const reader = new BlockReader();
    const payload = encrypt(cipher, Buffer.from("icon bytes"));
    reader.push(Buffer.concat([payload, Buffer.from("\r\n")]));

    const data = await reader.readDecryptedBytes(payload.length, cipher);

    expect(data.toString()).toBe("icon bytes");
    expect(await reader.readLine()).toBe("");
  });
});
