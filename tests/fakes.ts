import { SOH } from "../src/config.js";
import type { RecordStore, SubmitResult, Transport } from "../src/engine/correlation.js";
import { decode, encode } from "../src/engine/tagCodec.js";
import type { FieldMap } from "../src/schema/case.js";

/** Echoes the sent fields back with an accepted order status. */
export function echoReply(fields: FieldMap): FieldMap {
  const reply: FieldMap = new Map(fields);
  reply.set("39", "0");
  return reply;
}

/**
 * In-process counterparty: every accepted submission may append one reply
 * line to the record store it also serves.
 */
export class FakeCounterparty implements Transport, RecordStore {
  readonly sent: string[] = [];
  readonly lines: string[] = [];
  reads = 0;

  constructor(
    private readonly respond: (fields: FieldMap) => FieldMap | null = echoReply,
    private readonly accept: (fields: FieldMap) => SubmitResult = () => ({ ok: true }),
  ) {}

  async submit(message: string): Promise<SubmitResult> {
    const fields = decode(message, SOH);
    const verdict = this.accept(fields);
    if (!verdict.ok) {
      return verdict;
    }
    this.sent.push(message);
    const reply = this.respond(fields);
    if (reply) {
      this.lines.push(encode(reply, SOH));
    }
    return verdict;
  }

  async readLines(): Promise<string[]> {
    this.reads += 1;
    return [...this.lines];
  }

  sentFields(index: number): FieldMap {
    return decode(this.sent[index] ?? "", SOH);
  }
}

export function counterIdentifiers(): (templateId: string) => string {
  let next = 0;
  return (templateId) => {
    next += 1;
    return `${templateId}_${next}`;
  };
}

export const noSleep = async (): Promise<void> => undefined;
