import { z } from "zod";
import { NodeError } from "./errors.js";

// ids beyond 2^53 - 1 cannot be read back exactly from JSON
const MessageIdSchema = z.number().int().nonnegative().safe();

const InitPayloadSchema = z.object({
  type: z.literal("init"),
  node_id: z.string(),
  node_ids: z.array(z.string()),
});

const InitOkPayloadSchema = z.object({
  type: z.literal("init_ok"),
});

const EchoPayloadSchema = z.object({
  type: z.literal("echo"),
  echo: z.string(),
});

const EchoOkPayloadSchema = z.object({
  type: z.literal("echo_ok"),
  echo: z.string(),
});

const GeneratePayloadSchema = z.object({
  type: z.literal("generate"),
});

const GenerateOkPayloadSchema = z.object({
  type: z.literal("generate_ok"),
  id: z.string(),
});

export const PayloadSchema = z.discriminatedUnion("type", [
  InitPayloadSchema,
  InitOkPayloadSchema,
  EchoPayloadSchema,
  EchoOkPayloadSchema,
  GeneratePayloadSchema,
  GenerateOkPayloadSchema,
]);

export type Payload = z.infer<typeof PayloadSchema>;
export type PayloadType = Payload["type"];
export type PayloadOf<T extends PayloadType> = Extract<Payload, { type: T }>;

// on the wire the ids sit next to the payload fields inside `body`
const bodyIds = {
  msg_id: MessageIdSchema.optional(),
  in_reply_to: MessageIdSchema.optional(),
};

const WireMessageSchema = z.object({
  src: z.string(),
  dest: z.string(),
  body: z.discriminatedUnion("type", [
    InitPayloadSchema.extend(bodyIds),
    InitOkPayloadSchema.extend(bodyIds),
    EchoPayloadSchema.extend(bodyIds),
    EchoOkPayloadSchema.extend(bodyIds),
    GeneratePayloadSchema.extend(bodyIds),
    GenerateOkPayloadSchema.extend(bodyIds),
  ]),
});

export interface MessageBody<P extends Payload = Payload> {
  readonly msg_id?: number;
  readonly in_reply_to?: number;
  readonly payload: P;
}

export interface Message<P extends Payload = Payload> {
  readonly src: string;
  readonly dest: string;
  readonly body: MessageBody<P>;
}

export type ParseResult =
  | { ok: true; message: Message }
  | { ok: false; error: NodeError };

const ids = (msgId?: number, inReplyTo?: number) => ({
  ...(msgId === undefined ? {} : { msg_id: msgId }),
  ...(inReplyTo === undefined ? {} : { in_reply_to: inReplyTo }),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");

/**
 * Parses one line of input into a {@link Message}.
 *
 * Unknown fields are dropped; anything else that does not match the
 * envelope, including an unknown `type`, is a `DESERIALIZATION_ERROR`.
 */
export const parseMessage = (text: string): ParseResult => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return {
      ok: false,
      error: new NodeError(
        "DESERIALIZATION_ERROR",
        `input is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        err,
      ),
    };
  }

  const parsed = WireMessageSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      error: new NodeError(
        "DESERIALIZATION_ERROR",
        `malformed message: ${describeIssues(parsed.error)}`,
        { issues: parsed.error.issues.map((issue) => issue.path.join(".")) },
        parsed.error,
      ),
    };
  }

  const { src, dest, body } = parsed.data;
  const { msg_id, in_reply_to, ...payload } = body;
  return {
    ok: true,
    message: {
      src,
      dest,
      body: { ...ids(msg_id, in_reply_to), payload },
    },
  };
};

export const serializeMessage = ({ src, dest, body }: Message): string => {
  const { msg_id, in_reply_to, payload } = body;
  // undefined ids are left out by JSON.stringify
  return JSON.stringify({
    src,
    dest,
    body: { msg_id, in_reply_to, ...payload },
  });
};

/** Builds the reply to `request`, correlated through `in_reply_to`. */
export const reply = <P extends Payload>(
  request: Message,
  msgId: number,
  payload: P,
): Message<P> => ({
  src: request.dest,
  dest: request.src,
  body: { ...ids(msgId, request.body.msg_id), payload },
});
