/**
 * Stream events pushed by the validator node after `subscribe`.
 *
 * Wire messages are validated with zod and mapped onto a closed union; the
 * dispatcher matches on `kind` exhaustively.
 */

import { z } from 'zod';

export interface LedgerClosedEvent {
  kind: 'ledgerClosed';
  sequence: number;
  hash?: string;
  /** Seconds since the ledger epoch */
  ledgerTime: number;
  /** Drops */
  feeBase?: number;
  reserveBase?: number;
  reserveInc?: number;
  txnCount?: number;
  validatedLedgers?: string;
}

export interface ServerStatusEvent {
  kind: 'serverStatus';
  serverStatus: string;
  loadBase?: number;
  loadFactor?: number;
}

export interface ValidationReceivedEvent {
  kind: 'validationReceived';
  sequence: number;
  hash?: string;
  validationPublicKey?: string;
  masterKey?: string;
  full?: boolean;
}

export type StreamEvent = LedgerClosedEvent | ServerStatusEvent | ValidationReceivedEvent;
export type StreamEventKind = StreamEvent['kind'];

export const STREAMS = ['ledger', 'server', 'validations'] as const;

const LedgerClosedMessage = z.object({
  type: z.literal('ledgerClosed'),
  ledger_index: z.coerce.number().int().positive(),
  ledger_hash: z.string().optional(),
  ledger_time: z.number(),
  fee_base: z.number().optional(),
  reserve_base: z.number().optional(),
  reserve_inc: z.number().optional(),
  txn_count: z.number().optional(),
  validated_ledgers: z.string().optional(),
});

const ServerStatusMessage = z.object({
  type: z.literal('serverStatus'),
  server_status: z.string(),
  load_base: z.number().optional(),
  load_factor: z.number().optional(),
});

// ledger_index arrives as a string on this stream
const ValidationMessage = z.object({
  type: z.literal('validationReceived'),
  ledger_index: z.coerce.number().int().positive(),
  ledger_hash: z.string().optional(),
  validation_public_key: z.string().optional(),
  master_key: z.string().optional(),
  full: z.boolean().optional(),
});

const StreamMessage = z.discriminatedUnion('type', [LedgerClosedMessage, ServerStatusMessage, ValidationMessage]);

const KNOWN_TYPES = new Set<string>(['ledgerClosed', 'serverStatus', 'validationReceived']);

export type ParseResult =
  | { ok: true; event: StreamEvent }
  | { ok: false; reason: 'untyped' }
  | { ok: false; reason: 'unknown-kind'; type: string }
  | { ok: false; reason: 'malformed'; type: string; error: string };

function messageType(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('type' in raw)) return undefined;
  return typeof raw.type === 'string' ? raw.type : undefined;
}

export function parseStreamMessage(raw: unknown): ParseResult {
  const type = messageType(raw);
  if (type === undefined) return { ok: false, reason: 'untyped' };
  if (!KNOWN_TYPES.has(type)) return { ok: false, reason: 'unknown-kind', type };

  const parsed = StreamMessage.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const error = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid payload';
    return { ok: false, reason: 'malformed', type, error };
  }

  const msg = parsed.data;
  switch (msg.type) {
    case 'ledgerClosed':
      return {
        ok: true,
        event: {
          kind: 'ledgerClosed',
          sequence: msg.ledger_index,
          hash: msg.ledger_hash,
          ledgerTime: msg.ledger_time,
          feeBase: msg.fee_base,
          reserveBase: msg.reserve_base,
          reserveInc: msg.reserve_inc,
          txnCount: msg.txn_count,
          validatedLedgers: msg.validated_ledgers,
        },
      };
    case 'serverStatus':
      return {
        ok: true,
        event: {
          kind: 'serverStatus',
          serverStatus: msg.server_status,
          loadBase: msg.load_base,
          loadFactor: msg.load_factor,
        },
      };
    case 'validationReceived':
      return {
        ok: true,
        event: {
          kind: 'validationReceived',
          sequence: msg.ledger_index,
          hash: msg.ledger_hash,
          validationPublicKey: msg.validation_public_key,
          masterKey: msg.master_key,
          full: msg.full,
        },
      };
  }
}

/**
 * One method per event kind. Adding a kind to StreamEvent without adding a
 * handler here fails to compile in `dispatch`.
 */
export interface StreamHandlers {
  ledgerClosed(event: LedgerClosedEvent): void | Promise<void>;
  serverStatus(event: ServerStatusEvent): void | Promise<void>;
  validationReceived(event: ValidationReceivedEvent): void | Promise<void>;
}

export async function dispatch(event: StreamEvent, handlers: StreamHandlers): Promise<void> {
  switch (event.kind) {
    case 'ledgerClosed':
      return handlers.ledgerClosed(event);
    case 'serverStatus':
      return handlers.serverStatus(event);
    case 'validationReceived':
      return handlers.validationReceived(event);
    default: {
      const unhandled: never = event;
      throw new Error(`No handler for event ${JSON.stringify(unhandled)}`);
    }
  }
}
