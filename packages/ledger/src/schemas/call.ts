/**
 * CallV1: signed envelope for one Catalog operation.
 *
 * call_id = SHA256(canonical(CallV1 minus sig))
 * sig     = Ed25519(private_key, canonical(CallV1 minus sig)), hex
 *
 * `value` is the amount transferred with the call, as a decimal string so the
 * JSON wire format never carries a bigint.
 */

import { Type, type Static } from "@sinclair/typebox";
import { CALL_VERSION, MAX_CONTENT_BYTES, MAX_TITLE_LENGTH } from "../constants.js";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });
const Decimal = Type.String({ pattern: "^(0|[1-9][0-9]*)$", maxLength: 78 });

export const CallOp = Type.Union([
  Type.Literal("publish"),
  Type.Literal("buySubscription"),
  Type.Literal("getContent"),
  Type.Literal("getContentPremium"),
  Type.Literal("withdraw"),
  Type.Literal("distributePremiumCredits"),
  Type.Literal("closeCatalog"),
  Type.Literal("setContentFee"),
  Type.Literal("setContentPeriod"),
  Type.Literal("setPremiumFee"),
  Type.Literal("setPremiumPeriod"),
  Type.Literal("setPremiumWithdrawalPeriod"),
  Type.Literal("setPayableViews"),
  Type.Literal("deployContent"),
]);

export type CallOp = Static<typeof CallOp>;

export const CallV1 = Type.Object(
  {
    v: Type.Literal(CALL_VERSION),
    op: CallOp,
    /** Caller's Ed25519 public key (32 bytes, hex). */
    from: Hex32,
    /** Op-specific arguments; validated per op by the host. */
    args: Type.Record(Type.String(), Type.Unknown()),
    value: Decimal,
    /** Client timestamp, ms since Unix epoch. Makes otherwise equal calls distinct. */
    ts: Type.Integer({ minimum: 0 }),
    /** Ed25519 signature (hex) over canonical(CallV1 minus sig). */
    sig: Type.String({ pattern: "^[0-9a-f]{128}$" }),
  },
  { additionalProperties: false },
);

export type CallV1 = Static<typeof CallV1>;

// ── Per-op argument schemas ────────────────────────────────────────

export const NoArgs = Type.Object({}, { additionalProperties: false });

export const RefArgs = Type.Object({ ref: Hex32 }, { additionalProperties: false });

export const AmountArgs = Type.Object({ amount: Decimal }, { additionalProperties: false });

export const SecondsArgs = Type.Object(
  { seconds: Type.Integer({ minimum: 0 }) },
  { additionalProperties: false },
);

export const ViewsArgs = Type.Object(
  { views: Type.Integer({ minimum: 0 }) },
  { additionalProperties: false },
);

export const DeployContentArgs = Type.Object(
  {
    title: Type.String({ minLength: 1, maxLength: MAX_TITLE_LENGTH }),
    genre: Type.Integer({ minimum: 0 }),
    /** Raw content bytes, hex. */
    content: Type.String({ pattern: "^([0-9a-f]{2})+$", maxLength: MAX_CONTENT_BYTES * 2 }),
  },
  { additionalProperties: false },
);

export type RefArgs = Static<typeof RefArgs>;
export type AmountArgs = Static<typeof AmountArgs>;
export type SecondsArgs = Static<typeof SecondsArgs>;
export type ViewsArgs = Static<typeof ViewsArgs>;
export type DeployContentArgs = Static<typeof DeployContentArgs>;
