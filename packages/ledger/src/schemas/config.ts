/**
 * CatalogConfig: owner-tunable economic parameters.
 */

import { Type, type Static } from "@sinclair/typebox";

export const CatalogConfig = Type.Object(
  {
    /** Exact price of one pay-per-view grant (smallest currency unit). */
    contentFee: Type.BigInt({ minimum: 0n }),
    /** Seconds a pay-per-view grant stays valid. */
    contentPeriod: Type.Integer({ minimum: 0 }),
    /** Exact price of one premium subscription period. */
    premiumFee: Type.BigInt({ minimum: 0n }),
    /** Seconds added to a subscription per purchase. */
    premiumPeriod: Type.Integer({ minimum: 0 }),
    /** Minimum seconds between two premium distributions. */
    premiumWithdrawalPeriod: Type.Integer({ minimum: 0 }),
    /** Pay-per-view count an author needs before withdrawing. */
    payableViews: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type CatalogConfig = Static<typeof CatalogConfig>;

export type ConfigKey = keyof CatalogConfig;
