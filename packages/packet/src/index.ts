/**
 * @ilpcore/packet — Interledger addresses and payment packets.
 *
 * - Address: hierarchical, segment-aligned prefix matching
 * - PaymentPacket: immutable payment value, built only when complete
 * - Packet memo: canonical text form for carrying a packet on a transfer
 */

export {
  Address,
  MAX_ADDRESS_LENGTH,
  MAX_SEGMENTS,
  SEPARATOR,
} from "./address.js";

export { PaymentPacket, PaymentPacketBuilder } from "./payment.js";
export type { PaymentPacketInit, PaymentPacketJson } from "./payment.js";

export {
  encodePacketMemo,
  decodePacketMemo,
  PacketMemoSchema,
} from "./memo.js";
export type { PacketMemo } from "./memo.js";

export { ValidationError } from "./errors.js";
export type { ValidationErrorCode } from "./errors.js";
