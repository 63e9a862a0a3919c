/**
 * E2E: a two-block response through encode, decode and byte-level tampering.
 */

import { describe, it, expect } from "vitest";
import { CorruptPayloadError } from "@agentic-wire/sdk";
import { createHelloResponse } from "@agentic-wire/sdk/testing";
import { createLogger } from "@agentic-wire/shared";
import { createCodec } from "../../src/codec/codec.js";
import { createTypeRegistry } from "../../src/infrastructure/type-registry.js";

describe("Response round trip E2E", () => {
  const codec = createCodec({ registry: createTypeRegistry(), logger: createLogger("e2e", "error") });

  /** Offset of the `x` inside the escaped tool arguments `{\"q\":\"x\"}`. */
  function argumentOffset(bytes: Uint8Array): number {
    const marker = Buffer.from('\\"x\\"', "utf8");
    const at = Buffer.from(bytes).indexOf(marker);
    expect(at).toBeGreaterThan(0);
    return at + 2;
  }

  it("decodes the encoded response to an equal value", () => {
    const response = createHelloResponse();
    const decoded = codec.decode(codec.encode(response));

    expect(decoded).toEqual(response);
    expect(decoded.blocks.map((block) => block.type)).toEqual(["message", "tool_call"]);
  });

  it("decodes a single flipped character into a different, valid response", () => {
    const response = createHelloResponse();
    const tampered = Uint8Array.from(codec.encode(response));
    tampered[argumentOffset(tampered)] = "y".charCodeAt(0);

    const decoded = codec.decode(tampered);
    const call = decoded.blocks[1];
    expect(call.type).toBe("tool_call");
    if (call.type === "tool_call") {
      expect(call.toolCall.arguments).toBe('{"q":"y"}');
    }
    expect(decoded).not.toEqual(response);
  });

  it("reports corruption when a flipped byte breaks the body", () => {
    const tampered = Uint8Array.from(codec.encode(createHelloResponse()));
    tampered[argumentOffset(tampered)] = 0x22;

    expect(() => codec.decode(tampered)).toThrow(CorruptPayloadError);
  });
});
