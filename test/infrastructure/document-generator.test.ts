import { Readable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { DocumentGeneratorClient } from '../../src/infrastructure/oci/document-generator.js';
import { FUNCTION_ID, createFunctionsClient, httpError } from '../helpers/fakes.js';

describe('DocumentGeneratorClient.invoke', () => {
  it('sends the JSON payload to the configured function', async () => {
    const functions = createFunctionsClient();

    const invocation = await new DocumentGeneratorClient(functions, FUNCTION_ID).invoke({ requestType: 'SINGLE' });

    expect(invocation).toEqual({ status: 200, body: '{"code":200,"status":"OK"}' });
    expect(functions.invokeFunction).toHaveBeenCalledWith({
      functionId: FUNCTION_ID,
      invokeFunctionBody: '{"requestType":"SINGLE"}',
    });
  });

  it('reads a Node stream body', async () => {
    const functions = createFunctionsClient();
    functions.invokeFunction.mockResolvedValue({ value: Readable.from([Buffer.from('{"code":'), Buffer.from('200}')]) });

    const invocation = await new DocumentGeneratorClient(functions, FUNCTION_ID).invoke({});

    expect(invocation.body).toBe('{"code":200}');
  });

  it('reads a web stream body', async () => {
    const functions = createFunctionsClient();
    const encoder = new TextEncoder();
    const value = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"code":200}'));
        controller.close();
      },
    });
    functions.invokeFunction.mockResolvedValue({ value });

    const invocation = await new DocumentGeneratorClient(functions, FUNCTION_ID).invoke({});

    expect(invocation.body).toBe('{"code":200}');
  });

  it('returns an empty body when the response has no value', async () => {
    const functions = createFunctionsClient();
    functions.invokeFunction.mockResolvedValue({});

    await expect(new DocumentGeneratorClient(functions, FUNCTION_ID).invoke({})).resolves.toEqual({ status: 200, body: '' });
  });

  it('turns a rejected invocation into its status', async () => {
    const functions = createFunctionsClient();
    functions.invokeFunction.mockRejectedValue(httpError(429, 'Too many requests'));

    await expect(new DocumentGeneratorClient(functions, FUNCTION_ID).invoke({})).resolves.toEqual({
      status: 429,
      body: 'Too many requests',
    });
  });

  it('rethrows errors without a status', async () => {
    const functions = createFunctionsClient();
    functions.invokeFunction.mockRejectedValue(new Error('ECONNRESET'));

    await expect(new DocumentGeneratorClient(functions, FUNCTION_ID).invoke({})).rejects.toThrow('ECONNRESET');
  });
});
