/**
 * Stripe Gateway
 *
 * Per-conference Stripe access. Each conference carries its own secret key and
 * webhook signing secret, so clients are built lazily and cached by key.
 * The rest of the backend talks to Stripe only through PaymentGateway, which
 * tests replace with an in-process fake.
 */

import Stripe from "stripe";
import type { Logger } from "pino";
import type { ConferenceRow } from "../domain/commerce";

export interface PaymentIntentRequest {
  amount: number;
  currency: string;
  description: string;
  metadata: Record<string, string>;
  idempotencyKey: string;
}

export interface CreatedPaymentIntent {
  id: string;
  clientSecret: string;
}

/** Verified webhook envelope: the event id and type plus the untouched raw body. */
export interface VerifiedWebhookEvent {
  id: string;
  type: string;
  payload: string;
}

export interface PaymentGateway {
  isConfigured(conference: ConferenceRow): boolean;
  createPaymentIntent(conference: ConferenceRow, request: PaymentIntentRequest): Promise<CreatedPaymentIntent>;
  /** Throws when the signature is missing, malformed, stale or wrong. */
  verifyWebhookEvent(conference: ConferenceRow, payload: Buffer | string, signature: string): VerifiedWebhookEvent;
}

export class StripeNotConfiguredError extends Error {
  constructor(conferenceSlug: string, missing: string) {
    super(`Stripe not configured for conference '${conferenceSlug}' (missing ${missing})`);
    this.name = "StripeNotConfiguredError";
  }
}

export interface StripeGatewayOptions {
  webhookToleranceSec: number;
}

export class StripeGateway implements PaymentGateway {
  private readonly clients = new Map<string, Stripe>();
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly options: StripeGatewayOptions
  ) {
    this.logger = logger.child({ module: "stripeGateway" });
  }

  private ensureStripe(conference: ConferenceRow): Stripe {
    const secretKey = conference.stripe_secret_key;
    if (!secretKey) {
      throw new StripeNotConfiguredError(conference.slug, "stripe_secret_key");
    }
    let client = this.clients.get(secretKey);
    if (!client) {
      client = new Stripe(secretKey);
      this.clients.set(secretKey, client);
      this.logger.info({ conference: conference.slug }, "Stripe client initialized");
    }
    return client;
  }

  isConfigured(conference: ConferenceRow): boolean {
    return Boolean(conference.stripe_secret_key && conference.stripe_webhook_secret);
  }

  async createPaymentIntent(conference: ConferenceRow, request: PaymentIntentRequest): Promise<CreatedPaymentIntent> {
    const stripe = this.ensureStripe(conference);

    this.logger.info(
      { conference: conference.slug, amount: request.amount, metadata: request.metadata },
      "Creating Stripe PaymentIntent"
    );

    const intent = await stripe.paymentIntents.create(
      {
        amount: request.amount,
        currency: request.currency,
        description: request.description,
        metadata: request.metadata,
        automatic_payment_methods: { enabled: true },
      },
      { idempotencyKey: request.idempotencyKey }
    );

    if (!intent.client_secret) {
      throw new Error(`Stripe PaymentIntent ${intent.id} returned no client_secret`);
    }
    return { id: intent.id, clientSecret: intent.client_secret };
  }

  verifyWebhookEvent(conference: ConferenceRow, payload: Buffer | string, signature: string): VerifiedWebhookEvent {
    const stripe = this.ensureStripe(conference);
    const secret = conference.stripe_webhook_secret;
    if (!secret) {
      throw new StripeNotConfiguredError(conference.slug, "stripe_webhook_secret");
    }

    const event = stripe.webhooks.constructEvent(payload, signature, secret, this.options.webhookToleranceSec);
    return {
      id: event.id,
      type: event.type,
      payload: typeof payload === "string" ? payload : payload.toString("utf8"),
    };
  }
}
