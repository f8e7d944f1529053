// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify, { type FastifyInstance } from "fastify";
import { request } from "undici";
import { z } from "zod";
import { BindError, ConnectError, isEaddrInUse, StreamError, TransportError } from "../common/errors.js";
import { createLogger, errorMessage } from "../common/logger.js";
import type { PeerAddress } from "../common/types.js";
import { formatMultiaddr, getLocalIpAddress, parsePeerAddress, peerBaseUrl } from "./address.js";
import { GossipMesh, type Neighbour } from "./gossip.js";
import { peerIdFromPublicKey, type PeerKeys } from "./peer.js";
import { PubSubProtocol, pubSubMessageSchema, type PubSubMessage } from "./protocol.js";
import { InboundStream, OutboundStream, type IntentStream, type StreamHandler } from "./stream.js";
import { Subscription } from "./subscription.js";

const logger = createLogger("transport");

const DEFAULT_CONNECT_TIMEOUT_MS = 8_000;
const DEFAULT_STREAM_TIMEOUT_MS = 30_000;
const DEFAULT_BODY_LIMIT_BYTES = 1_048_576;

/** What the discovery, advertisement and connection code needs from a host. */
export interface P2PHost {
  readonly peerId: string;
  connect(peer: PeerAddress): Promise<void>;
  /** Whether a handshake with the peer is on record; evicted neighbours report false. */
  hasConnection(peerId: string): boolean;
  ping(peerId: string): Promise<boolean>;
  openStream(peerId: string, protocolId: string): Promise<IntentStream>;
  getMultiaddrs(): string[];
  publish(topic: string, data: Uint8Array): Promise<void>;
  subscribe(topic: string, signal?: AbortSignal): AsyncIterable<Uint8Array>;
}

export interface TransportHostOptions {
  keys: PeerKeys;
  listenHost: string;
  listenPort: number;
  /** Host placed in advertised multiaddrs; defaults to the LAN address when bound to a wildcard. */
  announceHost?: string;
  connectTimeoutMs?: number;
  streamTimeoutMs?: number;
  bodyLimitBytes?: number;
}

const identitySchema = z.object({
  peerId: z.string().min(1),
  publicKeyPem: z.string().min(1),
  protocols: z.array(z.string()),
  addrs: z.array(z.string())
});

type Identity = z.infer<typeof identitySchema>;

const connectBodySchema = z.object({
  peerId: z.string().min(1),
  publicKeyPem: z.string().min(1),
  multiaddr: z.string().min(1)
});

function headerValue(value: string | string[] | undefined): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export class TransportHost implements P2PHost {
  readonly peerId: string;
  private readonly app: FastifyInstance;
  private readonly gossip: GossipMesh;
  private readonly pubsub = new PubSubProtocol();
  private readonly handlers = new Map<string, StreamHandler>();
  private readonly subscriptions = new Map<string, Set<Subscription>>();
  private readonly pending = new Set<Promise<unknown>>();
  private boundPort: number | undefined;
  private stopped = false;

  constructor(private readonly options: TransportHostOptions) {
    this.peerId = options.keys.peerId;
    this.gossip = new GossipMesh(this.peerId);
    this.app = Fastify({ logger: false, bodyLimit: options.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES });
    this.app.addContentTypeParser("application/octet-stream", { parseAs: "buffer" }, (_req, body, done) => {
      done(null, body);
    });
    this.registerRoutes();
  }

  // ── Lifecycle ──

  async start(): Promise<number> {
    const { listenHost, listenPort } = this.options;
    try {
      await this.app.listen({ port: listenPort, host: listenHost });
    } catch (err) {
      const detail = isEaddrInUse(err)
        ? `port ${listenPort} is already in use; stop the other agent or set LISTEN_PORT`
        : errorMessage(err);
      throw new BindError(`${listenHost}:${listenPort}: ${detail}`, { cause: err });
    }
    const addr = this.app.server.address();
    this.boundPort = typeof addr === "object" && addr ? addr.port : listenPort;
    logger.info("listening", { peerId: this.peerId, addrs: this.getMultiaddrs() });
    return this.boundPort;
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    for (const subs of [...this.subscriptions.values()]) {
      for (const sub of [...subs]) sub.close();
    }
    await Promise.allSettled([...this.pending]);
    await this.app.close();
    this.boundPort = undefined;
  }

  get port(): number | undefined {
    return this.boundPort;
  }

  getMultiaddrs(): string[] {
    if (this.boundPort === undefined) {
      throw new TransportError("host_not_listening", "start() has not completed");
    }
    return [formatMultiaddr(this.announceHost(), this.boundPort, this.peerId)];
  }

  listNeighbours(): Neighbour[] {
    return this.gossip.listNeighbours();
  }

  // ── Connections and streams ──

  async connect(peer: PeerAddress): Promise<void> {
    if (peer.peerId === this.peerId) {
      throw new ConnectError("refusing to dial self");
    }
    const timeoutMs = this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const baseUrl = peerBaseUrl(peer);

    let identity: Identity;
    try {
      identity = await this.fetchIdentity(baseUrl, timeoutMs);
    } catch (err) {
      throw new ConnectError(`${peer.multiaddr}: ${errorMessage(err)}`, { cause: err });
    }
    if (identity.peerId !== peer.peerId) {
      throw new ConnectError(`peer_id_mismatch: expected ${peer.peerId}, got ${identity.peerId}`);
    }

    try {
      const res = await request(`${baseUrl}/p2p/connect`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          peerId: this.peerId,
          publicKeyPem: this.options.keys.publicKeyPem,
          multiaddr: this.getMultiaddrs()[0]
        }),
        signal: AbortSignal.timeout(timeoutMs)
      });
      const text = await res.body.text();
      if (res.statusCode < 200 || res.statusCode >= 300) {
        throw new Error(`register rejected with ${res.statusCode}: ${text}`);
      }
    } catch (err) {
      throw new ConnectError(`${peer.multiaddr}: ${errorMessage(err)}`, { cause: err });
    }

    this.gossip.addNeighbour({
      peerId: identity.peerId,
      publicKeyPem: identity.publicKeyPem,
      multiaddr: peer.multiaddr,
      baseUrl,
      protocols: identity.protocols
    });
    logger.info("connected", { peerId: peer.peerId, multiaddr: peer.multiaddr });
  }

  hasConnection(peerId: string): boolean {
    return this.gossip.getNeighbour(peerId) !== undefined;
  }

  async ping(peerId: string): Promise<boolean> {
    const neighbour = this.gossip.getNeighbour(peerId);
    if (!neighbour) return false;
    try {
      const identity = await this.fetchIdentity(
        neighbour.baseUrl,
        this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
      );
      if (identity.peerId !== peerId) return false;
      neighbour.protocols = identity.protocols;
      return true;
    } catch (err) {
      logger.debug("ping failed", { peerId, error: errorMessage(err) });
      return false;
    }
  }

  async openStream(peerId: string, protocolId: string): Promise<IntentStream> {
    const neighbour = this.gossip.getNeighbour(peerId);
    if (!neighbour) {
      throw new StreamError(`no_connection: ${peerId}`);
    }
    const timeoutMs = this.options.streamTimeoutMs ?? DEFAULT_STREAM_TIMEOUT_MS;
    if (!neighbour.protocols.includes(protocolId)) {
      // peers that dialled us never told us their protocols
      try {
        const identity = await this.fetchIdentity(neighbour.baseUrl, timeoutMs);
        neighbour.protocols = identity.protocols;
      } catch (err) {
        throw new StreamError(`${peerId}: ${errorMessage(err)}`, { cause: err });
      }
      if (!neighbour.protocols.includes(protocolId)) {
        throw new StreamError(`protocol_not_supported: ${protocolId} by ${peerId}`);
      }
    }
    return new OutboundStream(peerId, protocolId, {
      baseUrl: neighbour.baseUrl,
      localPeerId: this.peerId,
      timeoutMs
    });
  }

  setStreamHandler(protocolId: string, handler: StreamHandler): void {
    this.handlers.set(protocolId, handler);
  }

  // ── Pub/sub ──

  async publish(topic: string, data: Uint8Array): Promise<void> {
    this.requireListening();
    const message = this.pubsub.createMessage(topic, this.peerId, data, this.options.keys.privateKeyPem);
    await this.gossip.broadcast(message);
  }

  subscribe(topic: string, signal?: AbortSignal): Subscription {
    this.requireListening();
    const subscription = new Subscription(
      topic,
      (closed) => {
        const subs = this.subscriptions.get(topic);
        subs?.delete(closed);
        if (subs?.size === 0) this.subscriptions.delete(topic);
      },
      signal
    );
    if (!subscription.isClosed) {
      const subs = this.subscriptions.get(topic) ?? new Set<Subscription>();
      subs.add(subscription);
      this.subscriptions.set(topic, subs);
    }
    return subscription;
  }

  private ingest(message: PubSubMessage, relayedBy: string | undefined): { accepted: boolean; reason?: string } {
    if (message.fromPeerId === this.peerId) return { accepted: false, reason: "own_message" };

    const origin = this.gossip.getNeighbour(message.fromPeerId);
    const validation = this.pubsub.validateMessage(message, origin?.publicKeyPem);
    if (!validation.ok) return { accepted: false, reason: validation.reason };

    const data = this.pubsub.decodeData(message);
    for (const sub of this.subscriptions.get(message.topic) ?? []) {
      sub.push(data);
    }

    const exclude = new Set([this.peerId, message.fromPeerId]);
    if (relayedBy) exclude.add(relayedBy);
    this.track(
      this.gossip.broadcast(message, exclude).catch((err: unknown) => {
        logger.warn("relay failed", { id: message.id, error: errorMessage(err) });
      })
    );
    return { accepted: true };
  }

  // ── Routes ──

  private registerRoutes(): void {
    this.app.get("/p2p/identity", async () => ({
      peerId: this.peerId,
      publicKeyPem: this.options.keys.publicKeyPem,
      protocols: [...this.handlers.keys()],
      addrs: this.boundPort === undefined ? [] : this.getMultiaddrs()
    }));

    this.app.post("/p2p/connect", async (req, reply) => {
      const parsed = connectBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "invalid_connect_request" });
      }
      const body = parsed.data;
      if (peerIdFromPublicKey(body.publicKeyPem) !== body.peerId) {
        return reply.code(400).send({ error: "peer_id_key_mismatch" });
      }
      let address: PeerAddress;
      try {
        address = parsePeerAddress(body.multiaddr);
      } catch (err) {
        return reply.code(400).send({ error: "invalid_multiaddr", detail: errorMessage(err) });
      }
      if (address.peerId !== body.peerId) {
        return reply.code(400).send({ error: "multiaddr_peer_mismatch" });
      }
      const known = this.gossip.getNeighbour(body.peerId);
      this.gossip.addNeighbour({
        peerId: body.peerId,
        publicKeyPem: body.publicKeyPem,
        multiaddr: address.multiaddr,
        baseUrl: peerBaseUrl(address),
        protocols: known?.protocols ?? []
      });
      logger.info("inbound connection", { peerId: body.peerId, multiaddr: address.multiaddr });
      return { ok: true, peerId: this.peerId };
    });

    this.app.post("/p2p/stream", async (req, reply) => {
      const protocolId = headerValue(req.headers["x-protocol-id"]);
      const handler = protocolId ? this.handlers.get(protocolId) : undefined;
      if (!protocolId || !handler) {
        return reply.code(404).send({ error: "protocol_not_supported", protocolId });
      }
      const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const stream = new InboundStream(headerValue(req.headers["x-peer-id"]) ?? "unknown", protocolId, body);
      try {
        await handler(stream);
      } catch (err) {
        logger.error("stream handler failed", { protocolId, remotePeerId: stream.remotePeerId, error: errorMessage(err) });
      } finally {
        await stream.close();
      }
      return reply.type("application/octet-stream").send(stream.responseBody());
    });

    this.app.post("/p2p/pubsub", async (req, reply) => {
      const parsed = pubSubMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "invalid_pubsub_message" });
      }
      const result = this.ingest(parsed.data, headerValue(req.headers["x-peer-id"]));
      if (!result.accepted && result.reason !== "duplicate_message" && result.reason !== "own_message") {
        return reply.code(400).send({ error: result.reason });
      }
      return { ok: true, accepted: result.accepted };
    });
  }

  // ── Helpers ──

  private async fetchIdentity(baseUrl: string, timeoutMs: number): Promise<Identity> {
    const res = await request(`${baseUrl}/p2p/identity`, {
      method: "GET",
      signal: AbortSignal.timeout(timeoutMs)
    });
    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.text().catch(() => undefined);
      throw new Error(`identity request failed with ${res.statusCode}`);
    }
    const identity = identitySchema.parse(await res.body.json());
    if (peerIdFromPublicKey(identity.publicKeyPem) !== identity.peerId) {
      throw new Error("identity_key_mismatch");
    }
    return identity;
  }

  private announceHost(): string {
    if (this.options.announceHost) return this.options.announceHost;
    const { listenHost } = this.options;
    return listenHost === "0.0.0.0" || listenHost === "::" ? getLocalIpAddress() : listenHost;
  }

  private requireListening(): void {
    if (this.boundPort === undefined) {
      throw new TransportError("host_not_listening", "start() has not completed");
    }
  }

  private track(task: Promise<unknown>): void {
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }
}
