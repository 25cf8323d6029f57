import { Readable } from 'node:stream';
import { extractStatus } from '../../domain/errors.js';
import { logger } from '../logger.js';

const log = logger.child({ module: 'document-generator' });

const STATUS_OK = 200;

/** Subset of the oci-functions `FunctionsInvokeClient` the invoker calls. */
export interface FunctionsInvokeClient {
  invokeFunction(request: { functionId: string; invokeFunctionBody: string }): Promise<{ value?: unknown }>;
}

export interface FunctionInvocation {
  status: number;
  body: string;
}

async function readBody(value: unknown): Promise<string> {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf-8');

  const stream = value instanceof Readable ? value : toNodeStream(value);
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function toNodeStream(value: unknown): Readable {
  if (value instanceof ReadableStream) {
    return Readable.fromWeb(value);
  }
  throw new TypeError(`Unsupported function response body: ${Object.prototype.toString.call(value)}`);
}

export class DocumentGeneratorClient {
  constructor(
    private readonly client: FunctionsInvokeClient,
    private readonly functionId: string,
  ) {}

  /** Invokes the document generator function once. Returns the transport status and raw body. */
  async invoke(payload: unknown): Promise<FunctionInvocation> {
    const startTime = Date.now();

    let value: unknown;
    try {
      const response = await this.client.invokeFunction({
        functionId: this.functionId,
        invokeFunctionBody: JSON.stringify(payload),
      });
      value = response.value;
    } catch (cause) {
      const status = extractStatus(cause);
      if (status === undefined) throw cause;

      const details = cause instanceof Error ? cause.message : String(cause);
      log.warn({ functionId: this.functionId, status, details }, 'Function invocation rejected');
      return { status, body: details };
    }

    const body = await readBody(value);
    log.debug(
      { functionId: this.functionId, status: STATUS_OK, latencyMs: Date.now() - startTime, body },
      'Function invoked',
    );
    return { status: STATUS_OK, body };
  }
}
