import { describe, expect, it } from "vitest";
import { MessageType, ResponseType } from "./constants.js";
import {
  InvalidRequestError,
  UnknownApplicationError,
} from "./errors.js";
import {
  encodeResponse,
  errorResponse,
  okResponse,
  parseResponse,
  withCommonHeaders,
} from "./response.js";

describe("okResponse", () => {
  it("echoes the notification id on NOTIFY", () => {
    expect(encodeResponse(okResponse(MessageType.NOTIFY, "n-1")).toString()).toBe(
      "GNTP/1.0 -OK NONE\r\nResponse-Action: NOTIFY\r\nNotification-ID: n-1\r\n\r\n"
    );
  });

  it("sends an empty notification id when none was given", () => {
    expect(encodeResponse(okResponse(MessageType.NOTIFY)).toString()).toBe(
      "GNTP/1.0 -OK NONE\r\nResponse-Action: NOTIFY\r\nNotification-ID: \r\n\r\n"
    );
  });

  it("carries only the action on REGISTER", () => {
    expect(encodeResponse(okResponse(MessageType.REGISTER)).toString()).toBe(
      "GNTP/1.0 -OK NONE\r\nResponse-Action: REGISTER\r\n\r\n"
    );
  });

  it("carries a TTL on SUBSCRIBE", () => {
    expect(okResponse(MessageType.SUBSCRIBE).headers.get("Subscription-TTL")).toBe("300");
  });
});

describe("errorResponse", () => {
  it("carries code and description", () => {
    const response = errorResponse(new UnknownApplicationError("Foo"), MessageType.NOTIFY);
    expect(encodeResponse(response).toString()).toBe(
      "GNTP/1.0 -ERROR NONE\r\n" +
        "Response-Action: NOTIFY\r\n" +
        "Error-Code: 401\r\n" +
        "Error-Description: Unknown application: Foo\r\n" +
        "\r\n"
    );
  });

  it("omits the action when the request line was not understood", () => {
    const response = errorResponse(new InvalidRequestError("bad\r\nline"));
    expect(Array.from(response.headers.keys())).toEqual(["Error-Code", "Error-Description"]);
    expect(response.headers.get("Error-Description")).toBe("bad line");
  });
});

describe("withCommonHeaders", () => {
  it("appends headers without overriding existing ones", () => {
    const response = withCommonHeaders(
      okResponse(MessageType.REGISTER),
      new Map([
        ["Response-Action", "NOTIFY"],
        ["Origin-Machine-Name", "test-host"],
      ])
    );
    expect(Array.from(response.headers)).toEqual([
      ["Response-Action", "REGISTER"],
      ["Origin-Machine-Name", "test-host"],
    ]);
  });
});

describe("parseResponse", () => {
  it("reads back an encoded response", () => {
    const encoded = encodeResponse(errorResponse(new UnknownApplicationError("Foo")));
    const response = parseResponse(encoded);
    expect(response.type).toBe(ResponseType.ERROR);
    expect(response.headers.get("Error-Code")).toBe("401");
  });

  it("rejects a foreign status line", () => {
    expect(() => parseResponse("HTTP/1.1 200 OK\r\n\r\n")).toThrow(InvalidRequestError);
  });
});
