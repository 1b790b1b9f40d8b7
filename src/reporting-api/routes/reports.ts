import { Router } from 'express';
import { z } from 'zod';
import type { ReportingDesk } from '@core/desk';
import { REPORT_STATUSES } from '@shared/constants';
import { asyncHandler, callerContext, parseWith } from '../middleware/index';

const reportIdSchema = z.coerce.number().int().positive();

const submitSchema = z.object({
  category: z.number().int(),
  anonymous: z.boolean(),
  severity: z.number().int(),
});

const assignSchema = z.object({ investigator: z.string() });
const notesSchema = z.object({ text: z.string().max(10_000) });
const statusSchema = z.object({ status: z.enum(REPORT_STATUSES) });

export function createReportsRouter(desk: ReportingDesk): Router {
  const router = Router();

  // Submit a report (any caller)
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const input = parseWith(submitSchema, req.body);
      const reportId = await desk.submit(ctx, input);
      res.status(201).json({ success: true, data: { reportId } });
    }),
  );

  router.get('/:id', (req, res) => {
    const reportId = parseWith(reportIdSchema, req.params.id);
    res.json({ success: true, data: desk.getBasicInfo(reportId) });
  });

  // Sealed fields the caller has been granted
  router.get('/:id/sealed', (req, res) => {
    const reportId = parseWith(reportIdSchema, req.params.id);
    res.json({ success: true, data: desk.getSealedFields(callerContext(req), reportId) });
  });

  // --- Investigation ---

  router.post(
    '/:id/assign',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const reportId = parseWith(reportIdSchema, req.params.id);
      const { investigator } = parseWith(assignSchema, req.body);
      const deadline = await desk.assign(ctx, reportId, investigator);
      res.json({ success: true, data: { reportId, investigator, deadline: deadline.toISOString() } });
    }),
  );

  router.post(
    '/:id/notes',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const reportId = parseWith(reportIdSchema, req.params.id);
      const { text } = parseWith(notesSchema, req.body);
      await desk.addNotes(ctx, reportId, text);
      res.json({ success: true, data: desk.getInvestigationInfo(reportId) });
    }),
  );

  router.post(
    '/:id/status',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const reportId = parseWith(reportIdSchema, req.params.id);
      const { status } = parseWith(statusSchema, req.body);
      await desk.updateStatus(ctx, reportId, status);
      res.json({ success: true, data: desk.getBasicInfo(reportId) });
    }),
  );

  router.get('/:id/investigation', (req, res) => {
    const reportId = parseWith(reportIdSchema, req.params.id);
    res.json({ success: true, data: desk.getInvestigationInfo(reportId) });
  });

  router.get('/:id/investigation/notes', (req, res) => {
    const reportId = parseWith(reportIdSchema, req.params.id);
    res.json({ success: true, data: desk.getInvestigationNotes(callerContext(req), reportId) });
  });

  // --- Decryption ---

  router.post(
    '/:id/decryption',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const reportId = parseWith(reportIdSchema, req.params.id);
      const receipt = await desk.requestDecryption(ctx, reportId);
      res.status(202).json({
        success: true,
        data: { requestId: receipt.requestId, deadline: receipt.deadline.toISOString() },
      });
    }),
  );

  router.get('/:id/decryption', (req, res) => {
    const reportId = parseWith(reportIdSchema, req.params.id);
    res.json({ success: true, data: desk.getDecryptionStatus(reportId) });
  });

  // --- Refunds ---

  router.post(
    '/:id/refunds/decryption-timeout',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const reportId = parseWith(reportIdSchema, req.params.id);
      await desk.claimDecryptionTimeoutRefund(ctx, reportId);
      res.json({ success: true, data: desk.getBasicInfo(reportId) });
    }),
  );

  router.post(
    '/:id/refunds/investigation-timeout',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const reportId = parseWith(reportIdSchema, req.params.id);
      await desk.claimInvestigationTimeoutRefund(ctx, reportId);
      res.json({ success: true, data: desk.getBasicInfo(reportId) });
    }),
  );

  router.get('/:id/refund-available', (req, res) => {
    const reportId = parseWith(reportIdSchema, req.params.id);
    res.json({
      success: true,
      data: { available: desk.isRefundAvailable(reportId), kind: desk.availableRefund(reportId) },
    });
  });

  return router;
}
