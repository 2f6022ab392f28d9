/**
 * Packet memo codec.
 *
 * Ledgers that cannot carry a binary ILP packet attach it to the transfer
 * as a memo. The memo is the canonical JSON (RFC 8785) of the packet's
 * logical fields:
 *
 *   {"amount":"1000","data":"AQID","destination":"g.usd.bob"}
 *
 * Decoding validates every field and rebuilds the packet through the
 * builder, so a decoded memo always yields a well-formed packet.
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { PaymentPacket } from "./payment.js";

/** Canonical base-10: no sign, no leading zeros. */
const CANONICAL_AMOUNT = /^(0|[1-9][0-9]*)$/;

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const PacketMemoSchema = z
  .object({
    destination: z.string().min(1),
    amount: z.string().regex(CANONICAL_AMOUNT, "amount must be canonical base-10"),
    data: z.string().regex(BASE64, "data must be base64"),
  })
  .strict();

export type PacketMemo = z.infer<typeof PacketMemoSchema>;

export function encodePacketMemo(packet: PaymentPacket): string {
  return canonicalize(packet.toJSON());
}

/**
 * @throws {ValidationError} ARGUMENT_ERROR for malformed memos,
 *   INVALID_ADDRESS for a malformed destination
 */
export function decodePacketMemo(memo: string): PaymentPacket {
  let raw: unknown;
  try {
    raw = JSON.parse(memo);
  } catch {
    throw new ValidationError("ARGUMENT_ERROR", "Packet memo is not valid JSON");
  }

  const parsed = PacketMemoSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue !== undefined
      ? `${issue.path.join(".") || "memo"}: ${issue.message}`
      : "invalid memo";
    throw new ValidationError("ARGUMENT_ERROR", `Malformed packet memo (${detail})`);
  }

  return PaymentPacket.from({
    destinationAccount: parsed.data.destination,
    destinationAmount: BigInt(parsed.data.amount),
    data: new Uint8Array(Buffer.from(parsed.data.data, "base64")),
  });
}
