import { stat } from "node:fs/promises";
import { until } from "effection";
import { defineImplementation } from "@swhid-conformance/adapter";
import {
  encodeHash,
  getVariant,
  VARIANT_KEYS,
} from "@swhid-conformance/identifier";
import { hashContent, hashDirectory } from "./hash.ts";

export class UnsupportedObjectType extends Error {
  override name = "UnsupportedObjectType";
}

export class PayloadKindError extends Error {
  override name = "PayloadKindError";
}

export default defineImplementation({
  info: {
    version: "0.1.0",
    language: "typescript",
    description: "content and directory identifiers over the git object model",
  },
  capabilities: {
    types: ["cnt", "dir"],
    variants: [...VARIANT_KEYS],
  },
  *compute(request) {
    let variant = getVariant(request.variant);
    let info = yield* until(stat(request.payloadPath));
    let hash: Uint8Array;
    switch (request.type) {
      case "cnt":
        if (!info.isFile()) {
          throw new PayloadKindError(`${request.payloadPath} is not a file`);
        }
        hash = yield* hashContent(request.payloadPath, variant.algorithm);
        break;
      case "dir":
        if (!info.isDirectory()) {
          throw new PayloadKindError(`${request.payloadPath} is not a directory`);
        }
        hash = yield* hashDirectory(request.payloadPath, variant.algorithm);
        break;
      default:
        throw new UnsupportedObjectType(`object type ${request.type} is not supported`);
    }
    return `swh:${variant.version}:${request.type}:${encodeHash(hash, variant)}`;
  },
});
