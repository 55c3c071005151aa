import YAML from "yaml";

import {
  DuplicateReceiverError,
  MalformedValueError,
  ReceiverLoadError,
  type ReceiverLoadFailure,
} from "./errors.js";
import { isMapping } from "./fields.js";
import { type AppLogger, appLogger, normalizeError } from "./observability/logger.js";
import { type Receiver, UNNAMED_RECEIVER, decodeReceiverNode, receiverIntegrations } from "./receiver.js";

export type LoadReceiversOptions = {
  logger?: AppLogger;
};

const DOCUMENT_PATH = "receivers";

function receiverNodes(document: unknown): unknown[] {
  if (document === null || document === undefined) {
    return [];
  }
  if (Array.isArray(document)) {
    return document;
  }
  if (isMapping(document)) {
    const receivers = new Map<string, unknown>(Object.entries(document)).get("receivers");
    if (receivers === undefined || receivers === null) {
      return [];
    }
    if (Array.isArray(receivers)) {
      return receivers;
    }
  }
  throw new ReceiverLoadError([
    {
      receiver: UNNAMED_RECEIVER,
      path: DOCUMENT_PATH,
      error: new MalformedValueError("receivers must be a list", { receiverType: "receiver" }),
    },
  ]);
}

/**
 * Decodes every receiver in `document`, which is either a list of receiver
 * nodes or a mapping holding one under `receivers`.
 *
 * All failures are collected before anything is thrown so that a single
 * {@link ReceiverLoadError} reports every broken integration at once.
 */
export function loadReceivers(document: unknown, options: LoadReceiversOptions = {}): Receiver[] {
  const logger = options.logger ?? appLogger;
  const failures: ReceiverLoadFailure[] = [];
  const receivers: Receiver[] = [];
  const seenNames = new Set<string>();

  receiverNodes(document).forEach((node, index) => {
    const path = `${DOCUMENT_PATH}[${index}]`;
    const result = decodeReceiverNode(node, path);
    for (const failure of result.failures) {
      logger.error(
        { receiver: failure.receiver, path: failure.path, err: normalizeError(failure.error) },
        "receiver config rejected",
      );
      failures.push(failure);
    }
    if (result.name !== "" && seenNames.has(result.name)) {
      const failure = { receiver: result.name, path, error: new DuplicateReceiverError(result.name) };
      logger.error({ receiver: failure.receiver, path, err: normalizeError(failure.error) }, "receiver config rejected");
      failures.push(failure);
      return;
    }
    seenNames.add(result.name);
    const { receiver } = result;
    if (!receiver) {
      return;
    }
    receivers.push(receiver);
    logger.debug(
      { receiver: receiver.name, integrations: receiverIntegrations(receiver).length },
      "receiver decoded",
    );
  });

  if (failures.length > 0) {
    throw new ReceiverLoadError(failures);
  }
  return receivers;
}

function invalidYaml(message: string): ReceiverLoadError {
  return new ReceiverLoadError([
    {
      receiver: UNNAMED_RECEIVER,
      path: DOCUMENT_PATH,
      error: new MalformedValueError(`invalid YAML: ${message}`, { receiverType: "receiver" }),
    },
  ]);
}

/** Parses a YAML receivers document and decodes it with {@link loadReceivers}. */
export function parseReceiversYaml(text: string, options: LoadReceiversOptions = {}): Receiver[] {
  const parsed = YAML.parseDocument(text);
  const [syntaxError] = parsed.errors;
  if (syntaxError) {
    throw invalidYaml(syntaxError.message);
  }
  // Numeric scalars keep the text they were written with, so `0123` or a
  // long numeric key reaches string and secret fields unchanged.
  YAML.visit(parsed, {
    Scalar(_key, node) {
      if ((typeof node.value === "number" || typeof node.value === "bigint") && typeof node.source === "string") {
        node.value = node.source;
      }
    },
  });
  let document: unknown;
  try {
    document = parsed.toJS();
  } catch (error) {
    throw invalidYaml(error instanceof Error ? error.message : String(error));
  }
  return loadReceivers(document, options);
}
