import { describe, it, expect } from "vitest";

import { extractErrorMessage } from "../../../src/utils/error-body.js";

describe("extractErrorMessage", () => {
  it("reads the message from a JSON envelope", () => {
    const body = JSON.stringify({
      errorsExist: true,
      errorList: { error: [{ errorCode: "401861", errorMessage: "User with identifier X was not found." }] },
    });
    expect(extractErrorMessage(body, "application/json")).toBe(
      "User with identifier X was not found.",
    );
  });

  it("reads the message from a namespaced XML envelope", () => {
    const body =
      '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<web_service_result xmlns="http://com/exlibris/urm/general/xmlbeans">' +
      "<errorsExist>true</errorsExist><errorList><error>" +
      "<errorCode>402203</errorCode><errorMessage>Input parameters mmsId 1 is not valid.</errorMessage>" +
      "</error></errorList></web_service_result>";
    expect(extractErrorMessage(body, "application/xml")).toBe(
      "Input parameters mmsId 1 is not valid.",
    );
  });

  it("sniffs JSON when the content type is missing", () => {
    expect(extractErrorMessage('{"errorMessage":"plain"}', "")).toBe("plain");
  });

  it("returns null for empty or unrecognised bodies", () => {
    expect(extractErrorMessage("   ", "application/json")).toBeNull();
    expect(extractErrorMessage("{not json", "application/json")).toBeNull();
    expect(extractErrorMessage('{"status":"bad"}', "application/json")).toBeNull();
  });
});
