import { describe, it, expect } from "vitest";
import { NoSuchKey, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import { isMissingObjectError, S3ObjectStore } from "./object-store.js";

describe("isMissingObjectError()", () => {
  it("should recognise NoSuchKey", () => {
    expect(isMissingObjectError(new NoSuchKey({ $metadata: {}, message: "missing" }))).toBe(true);
  });

  it("should recognise a bare 404", () => {
    const err = new S3ServiceException({
      name: "NotFound",
      $fault: "client",
      $metadata: { httpStatusCode: 404 },
      message: "not found",
    });
    expect(isMissingObjectError(err)).toBe(true);
  });

  it("should not treat other failures as missing", () => {
    const denied = new S3ServiceException({
      name: "AccessDenied",
      $fault: "client",
      $metadata: { httpStatusCode: 403 },
      message: "denied",
    });
    expect(isMissingObjectError(denied)).toBe(false);

    const noBucket = new S3ServiceException({
      name: "NoSuchBucket",
      $fault: "client",
      $metadata: { httpStatusCode: 404 },
      message: "The specified bucket does not exist",
    });
    expect(isMissingObjectError(noBucket)).toBe(false);
    expect(isMissingObjectError(new Error("socket hang up"))).toBe(false);
  });
});

describe("S3ObjectStore", () => {
  it("should address objects by s3 URL", () => {
    const client = new S3Client({ region: "us-east-1" });
    const store = new S3ObjectStore(client, "catalog");

    expect(store.urlFor("prod/services.json")).toBe("s3://catalog/prod/services.json");
    client.destroy();
  });
});
