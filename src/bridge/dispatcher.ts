import { isBlankLine, parseJsonLine } from "../protocols/envelope/codec.js";
import { errorResponse, okResponse, readyEnvelope } from "../protocols/envelope/response.js";
import type { CallRequest, ControlCommand, ReadyEnvelope, ResponseEnvelope } from "../protocols/envelope/types.js";
import { classifyEnvelope } from "../protocols/envelope/validate.js";
import { describeValue, type WireCodec } from "../protocols/wire/codec.js";
import type { WireValue } from "../protocols/wire/types.js";
import { CodecError, UnsupportedTypeError } from "../shared/errors.js";
import { getLogger, type Logger } from "../shared/logging.js";
import type { ModuleRegistry } from "./registry.js";

export interface DispatcherOptions {
  registry: ModuleRegistry;
  codec: WireCodec;
  logger?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : describeValue(err);
}

/** One-line description of a failure raised while decoding arguments or running the callable. */
export function describeFailure(err: unknown): string {
  if (err instanceof CodecError || err instanceof UnsupportedTypeError) return `${err.name}: ${err.message}`;
  if (err instanceof TypeError) return `Type error: ${err.message}`;
  if (err instanceof RangeError) return `Value error: ${err.message}`;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return `Error: ${describeValue(err)}`;
}

function runtimeVersion(): number[] {
  return process.versions.node.split(".").slice(0, 2).map(Number);
}

/**
 * Turns one input line into at most one response envelope. Every failure is
 * converted into an `error` response; nothing is thrown to the caller.
 */
export class Dispatcher {
  private readonly registry: ModuleRegistry;
  private readonly codec: WireCodec;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.codec = options.codec;
    this.logger = options.logger ?? getLogger();
  }

  ready(): ReadyEnvelope {
    return readyEnvelope(this.codec.capabilities);
  }

  health(): WireValue {
    const { arrays, tables } = this.codec.capabilities;
    return { ok: true, arrays, tables, runtime: "node", runtime_version: runtimeVersion() };
  }

  /** Resolves to null for a blank line, which gets no response at all. */
  async handleLine(line: string): Promise<ResponseEnvelope | null> {
    if (isBlankLine(line)) return null;
    let data: unknown;
    try {
      data = parseJsonLine(line);
    } catch (err) {
      return errorResponse(`Invalid JSON: ${errorMessage(err)}`);
    }
    try {
      return await this.handleEnvelope(data);
    } catch (err) {
      this.logger.error({ err }, "dispatch failed");
      return errorResponse(`Bridge error: ${errorMessage(err)}`);
    }
  }

  async handleEnvelope(data: unknown): Promise<ResponseEnvelope> {
    const envelope = classifyEnvelope(data);
    switch (envelope.kind) {
      case "invalid":
        return errorResponse(envelope.message);
      case "control":
        return this.control(envelope.cmd);
      case "call":
        return this.call(envelope.request);
    }
  }

  private control(cmd: ControlCommand): ResponseEnvelope {
    this.logger.debug({ cmd }, "control command");
    return cmd === "ping" ? okResponse("pong") : okResponse(this.health());
  }

  private async call(request: CallRequest): Promise<ResponseEnvelope> {
    const { module, fn } = request;
    this.logger.debug({ module, fn, argc: request.args.length }, "dispatch");
    try {
      const args = this.codec.decodeSequence(request.args);
      const kwargs = this.codec.decodeMapping(request.kwargs);

      const resolution = this.registry.resolve(module, fn);
      if (resolution.kind === "module-not-found") {
        return errorResponse(`Module not found: ${module} - no module named '${module}'`);
      }
      if (resolution.kind === "function-not-found") {
        return errorResponse(`Function not found: ${fn} in ${module} - module '${module}' has no function '${fn}'`);
      }

      // Keyword mapping is passed only when non-empty, so functions without one still work.
      const result: unknown =
        Object.keys(kwargs).length > 0 ? await resolution.fn(...args, kwargs) : await resolution.fn(...args);
      return okResponse(this.codec.encode(result));
    } catch (err) {
      this.logger.debug({ module, fn, err }, "invocation failed");
      return errorResponse(describeFailure(err));
    }
  }
}
