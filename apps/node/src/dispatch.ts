/**
 * Call dispatch: one verified CallV1 in, one Catalog operation out.
 *
 * Arguments are checked against the op's schema before the Catalog sees
 * them. The call's value is taken at face value (dev host: no settlement
 * layer behind the node).
 */

import { Value } from "@sinclair/typebox/value";
import type { Static, TSchema } from "@sinclair/typebox";
import {
  AmountArgs,
  CatalogError,
  DeployContentArgs,
  NoArgs,
  RefArgs,
  SecondsArgs,
  ViewsArgs,
  callFrom,
  fromHex,
  noValue,
  type CallV1,
} from "@catalog/ledger";
import { MemoryContentManager } from "@catalog/chain";
import type { NodeContext } from "./context.js";

type DispatchContext = Pick<NodeContext, "catalog" | "host">;

function argsOf<T extends TSchema>(schema: T, call: CallV1): Static<T> {
  if (!Value.Check(schema, call.args)) {
    const first = Value.Errors(schema, call.args).First();
    throw new CatalogError(
      "InvalidArgument",
      `${call.op} args${first ? ` at ${first.path || "/"}: ${first.message}` : " invalid"}`,
    );
  }
  return call.args;
}

/** Apply `call` to the catalog. Returns the op's result (ledger types). */
export function dispatchCall({ catalog, host }: DispatchContext, call: CallV1): unknown {
  const ctx = callFrom(call.from, BigInt(call.value));

  switch (call.op) {
    case "publish":
      return catalog.publish(ctx, argsOf(RefArgs, call).ref);

    case "buySubscription":
      argsOf(NoArgs, call);
      return { expiration: catalog.buySubscription(ctx) };

    case "getContent":
      return { until: catalog.getContent(ctx, argsOf(RefArgs, call).ref) };

    case "getContentPremium":
      return { until: catalog.getContentPremium(ctx, argsOf(RefArgs, call).ref) };

    case "withdraw":
      argsOf(NoArgs, call);
      return { amount: catalog.withdraw(ctx) };

    case "distributePremiumCredits":
      argsOf(NoArgs, call);
      return catalog.distributePremiumCredits(ctx);

    case "closeCatalog":
      argsOf(NoArgs, call);
      return catalog.closeCatalog(ctx);

    case "setContentFee":
      catalog.setContentFee(ctx, BigInt(argsOf(AmountArgs, call).amount));
      return { contentFee: catalog.getConfig().contentFee };

    case "setPremiumFee":
      catalog.setPremiumFee(ctx, BigInt(argsOf(AmountArgs, call).amount));
      return { premiumFee: catalog.getConfig().premiumFee };

    case "setContentPeriod":
      catalog.setContentPeriod(ctx, argsOf(SecondsArgs, call).seconds);
      return { contentPeriod: catalog.getConfig().contentPeriod };

    case "setPremiumPeriod":
      catalog.setPremiumPeriod(ctx, argsOf(SecondsArgs, call).seconds);
      return { premiumPeriod: catalog.getConfig().premiumPeriod };

    case "setPremiumWithdrawalPeriod":
      catalog.setPremiumWithdrawalPeriod(ctx, argsOf(SecondsArgs, call).seconds);
      return { premiumWithdrawalPeriod: catalog.getConfig().premiumWithdrawalPeriod };

    case "setPayableViews":
      catalog.setPayableViews(ctx, argsOf(ViewsArgs, call).views);
      return { payableViews: catalog.getConfig().payableViews };

    case "deployContent": {
      const args = argsOf(DeployContentArgs, call);
      noValue(ctx);
      const manager = new MemoryContentManager(
        { author: call.from, title: args.title, genre: args.genre, content: fromHex(args.content) },
        () => host.now(),
      );
      const ref = host.deploy(manager);
      return { ref, fingerprint: manager.getInfo().fingerprint };
    }
  }
}
