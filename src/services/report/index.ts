import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { documentGeneratorResponseSchema } from '../../domain/schemas.js';
import { logger } from '../../infrastructure/logger.js';
import type { DocumentGeneratorClient } from '../../infrastructure/oci/document-generator.js';
import type { StoredObjectRef } from '../../domain/types.js';
import type { ReportPayload } from './types.js';

export type { ReportPayload, ReportData, ReportWordEntry, ReportAssets } from './types.js';
export { buildReportData, buildReportObjectKey, buildReportPayload, toPercentage, roundTo } from './payload.js';

const STATUS_OK = 200;

/**
 * Submits the payload to the document generator. Both the function's transport
 * status and the generator's own `code` must be 200 for the PDF to exist.
 *
 * @throws {SyntaxError} If the function answers 200 with a body that is not JSON
 */
export async function generateReport(
  client: DocumentGeneratorClient,
  payload: ReportPayload,
  report: StoredObjectRef,
): Promise<Result<StoredObjectRef, AppError>> {
  const log = logger.child({ step: 'generating_report', objectKey: report.objectKey });

  const invocation = await client.invoke(payload);

  if (invocation.status !== STATUS_OK) {
    const message = `Document generator invocation failed with status code ${invocation.status}`;
    log.error({ errorCode: ErrorCode.REPORT_GENERATION_FAILED, status: invocation.status }, message);
    return err(
      createAppError(ErrorCode.REPORT_GENERATION_FAILED, message, 'generating_report', invocation.body || undefined),
    );
  }

  const decoded: unknown = JSON.parse(invocation.body);
  const parsed = documentGeneratorResponseSchema.safeParse(decoded);
  const code: unknown = parsed.success ? parsed.data.code : undefined;

  if (code !== STATUS_OK) {
    const message = `Document generation failure: '${code === undefined ? 'unknown' : String(code)}'. See Application Log`;
    log.error({ errorCode: ErrorCode.REPORT_GENERATION_FAILED, applicationCode: code }, message);
    return err(createAppError(ErrorCode.REPORT_GENERATION_FAILED, message, 'generating_report', invocation.body));
  }

  log.info('Document generated successfully');
  return ok(report);
}
