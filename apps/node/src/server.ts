/**
 * Catalog node: hosts one Catalog on an in-memory execution host.
 *
 * Routes:
 *   POST /call              - signed CallV1 ingest (every mutation)
 *   GET  /call/:call_id     - outcome of an applied call
 *   GET  /content, /content/statistics, /content/new, /content/latest,
 *        /content/popular, /content/:ref
 *   GET  /authors, /authors/:id, /premium/:account, /pool, /config
 *   GET  /events            - committed events by seq
 *   GET  /health            - health check
 *
 * Value carried by a call is trusted as paid (dev host, no settlement layer).
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { Catalog, type CatalogConfig, type Identity } from "@catalog/ledger";
import { MemoryHost } from "@catalog/chain";
import { config } from "./config.js";
import { CallStore } from "./call-store.js";
import type { NodeContext } from "./context.js";
import { catalogErrorHandler } from "./errors.js";
import { EventLog } from "./event-log/writer.js";
import { loadIdentity, type NodeIdentity } from "./identity.js";
import { createDistributionScheduler } from "./scheduler.js";
import { callRoutes } from "./routes/call.js";
import { contentRoutes } from "./routes/content.js";
import { ledgerRoutes } from "./routes/ledger.js";
import { eventRoutes } from "./routes/events.js";
import { healthRoutes } from "./routes/health.js";
import { toWire } from "./wire.js";

export interface NodeDeps {
  host?: MemoryHost;
  identity?: NodeIdentity;
  /** Catalog owner. Default: OWNER_PUBKEY, else the node identity. */
  owner?: Identity;
  catalogConfig?: Partial<CatalogConfig>;
  logLevel?: string;
  /** 0 disables the distribution scheduler. */
  distributionIntervalMs?: number;
  maxCallSkewMs?: number;
}

/** Wall clock in whole seconds. */
function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

export async function buildApp(deps?: NodeDeps) {
  const app = Fastify({
    logger: { level: deps?.logLevel ?? config.logLevel },
    bodyLimit: 4 * 1024 * 1024, // deployContent carries content as hex
  });

  const identity = deps?.identity ?? (await loadIdentity(config.nodePrivateKeyHex));
  const host = deps?.host ?? new MemoryHost({ clock: systemClock });
  const owner = deps?.owner ?? (config.ownerPubkey || identity.publicKey);

  const catalog = new Catalog({
    owner,
    host,
    config: deps?.catalogConfig ?? config.catalog,
    onListenerError: (err, event) =>
      app.log.error({ err, type: event.type }, "catalog listener failed"),
  });

  // The log only ever sees committed events.
  const eventLog = new EventLog();
  catalog.subscribe((event) => {
    eventLog.append(event, host.now());
  });

  const maxCallSkewMs = deps?.maxCallSkewMs ?? config.maxCallSkewMs;
  const calls = new CallStore(2 * maxCallSkewMs);
  const callCleanup = setInterval(() => calls.cleanup(), 60_000);

  const scheduler = createDistributionScheduler(catalog, identity.publicKey, {
    intervalMs: deps?.distributionIntervalMs ?? config.distributionIntervalMs,
    onDistribute: (result) =>
      app.log.info(
        { paid: toWire(result.paid), forfeited: toWire(result.forfeited), views: result.views },
        "premium credit distributed",
      ),
    onSkip: (reason) => app.log.debug({ reason }, "distribution skipped"),
    onError: (err) => app.log.error({ err }, "distribution failed"),
  });
  const schedulerEnabled = (deps?.distributionIntervalMs ?? config.distributionIntervalMs) > 0;

  app.addHook("onReady", async () => {
    if (schedulerEnabled) scheduler.start();
  });
  app.addHook("onClose", async () => {
    scheduler.stop();
    clearInterval(callCleanup);
  });

  app.setErrorHandler(catalogErrorHandler);

  const ctx: NodeContext = { catalog, host, eventLog, calls, identity, maxCallSkewMs };

  app.log.info({ owner, node: identity.publicKey, config: toWire(catalog.getConfig()) }, "catalog ready");

  callRoutes(app, ctx);
  contentRoutes(app, ctx);
  ledgerRoutes(app, ctx);
  eventRoutes(app, ctx);
  healthRoutes(app, ctx);

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── catalog node config ───");
  console.log(`  port:               ${config.port}`);
  console.log(`  owner:              ${config.ownerPubkey || "(node identity)"}`);
  console.log(`  node key:           ${config.nodePrivateKeyHex ? "(from env)" : "(ephemeral)"}`);
  console.log(`  distribution every: ${config.distributionIntervalMs}ms`);
  console.log(`  log level:          ${config.logLevel}`);
  console.log("───────────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
