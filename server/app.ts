import cors from "cors";
import express from "express";
import { z } from "zod";
import type { Capabilities } from "./capabilities/types.js";
import { type AppConfig, configuredSecrets } from "./config.js";
import { WorkflowError, isWorkflowError } from "./domain/errors.js";
import type { SessionStore } from "./domain/store.js";
import type { HandoffPayload, Session } from "./domain/types.js";
import { LeadDiscoveryWorkflow } from "./orchestrator/discovery-workflow.js";
import { OutreachWorkflow } from "./orchestrator/outreach-workflow.js";
import { SessionContext } from "./orchestrator/session-context.js";
import { redactSecrets } from "./services/redaction.js";

export interface AppDependencies {
  config: AppConfig;
  capabilities: Capabilities;
  store: SessionStore;
  clock?: () => string;
}

type AsyncHandler = (req: express.Request, res: express.Response, next: express.NextFunction) => Promise<void>;
function asyncHandler(fn: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

const leadFieldSchema = z.enum(["name", "company", "role", "email", "sourceUrl", "status", "notes"]);

const criteriaSchema = z.object({
  industry: z.string().optional(),
  geography: z.string().optional(),
  roles: z.array(z.string()).optional(),
  companySize: z.string().optional(),
  exclusions: z.array(z.string()).optional(),
  fields: z.array(leadFieldSchema).optional(),
  keywords: z.array(z.string()).optional()
});

const approvalSchema = z.object({
  approvalId: z.string().min(1)
});

const selectionSchema = z.union([
  z.object({ all: z.literal(true) }),
  z.object({ positions: z.array(z.number().int()).min(1) }),
  z.object({ leadIds: z.array(z.string()).min(1) })
]);

const approveLeadsSchema = approvalSchema.extend({
  selection: selectionSchema
});

const iterateSchema = z.object({
  changes: criteriaSchema.optional()
});

const handoffSchema = z.object({
  handoffId: z.string().optional()
});

const confirmDatabaseSchema = approvalSchema.extend({
  databaseId: z.string().min(1)
});

const propertyBindingSchema = z.object({
  property: z.string().min(1),
  type: z.enum(["title", "rich_text", "email", "url", "select", "status", "phone_number", "number", "unknown"])
});

const schemaMappingSchema = z.object({
  mapping: z
    .object({
      name: propertyBindingSchema,
      company: propertyBindingSchema.optional(),
      role: propertyBindingSchema.optional(),
      email: propertyBindingSchema.optional(),
      sourceUrl: propertyBindingSchema.optional(),
      status: propertyBindingSchema.optional(),
      notes: propertyBindingSchema.optional()
    })
    .optional()
});

const captureSchema = z.object({
  leadIds: z.array(z.string()).optional()
});

const sendDraftSchema = z.object({
  from: z.string().optional(),
  to: z.array(z.string()).optional(),
  leadIds: z.array(z.string()).optional(),
  useCapturedLeads: z.boolean().optional(),
  subject: z.string().optional(),
  html: z.string().optional(),
  text: z.string().optional(),
  mode: z.enum(["single", "batch"]).optional(),
  scheduledAt: z.string().optional(),
  attachments: z
    .array(
      z.object({
        filename: z.string().min(1),
        content: z.string().min(1),
        contentType: z.string().optional()
      })
    )
    .optional()
});

const scheduleSchema = z.object({
  scheduledAt: z.string().min(1)
});

export function createApp({ config, capabilities, store, clock }: AppDependencies): express.Express {
  const app = express();
  const secrets = configuredSecrets(config);
  const discovery = new LeadDiscoveryWorkflow(capabilities.search, config.discovery);
  const outreach = new OutreachWorkflow(capabilities.store, capabilities.delivery, {
    batchLimit: config.resend.batchLimit
  });

  function contextFor(sessionId: string): SessionContext {
    return new SessionContext(store.get(sessionId), { logLimit: config.logLimit, secrets, clock });
  }

  // State changes are kept even when the operation ends in a workflow error.
  async function run<T>(sessionId: string, task: (ctx: SessionContext) => Promise<T>): Promise<T> {
    const ctx = contextFor(sessionId);
    try {
      return await task(ctx);
    } finally {
      await store.persist();
    }
  }

  function findHandoff(session: Session, handoffId?: string): HandoffPayload {
    const handoffs = session.discovery.handoffs;
    const handoff = handoffId ? handoffs.find((item) => item.id === handoffId) : handoffs[handoffs.length - 1];
    if (!handoff) {
      throw new WorkflowError("NotFound", handoffId ? `Handoff ${handoffId} not found` : "No approved leads have been handed off yet");
    }
    return handoff;
  }

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: "5mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      service: "lead-outreach-workflows",
      capabilities: {
        search: capabilities.search.name,
        store: capabilities.store.name,
        delivery: capabilities.delivery.name
      },
      persistence: store.isUsingPostgres() ? "postgres" : config.sessionStore
    });
  });

  app.get("/api/sessions", (_req, res) => {
    res.json(store.list());
  });

  app.post(
    "/api/sessions",
    asyncHandler(async (_req, res) => {
      const session = store.create();
      await store.persist();
      res.status(201).json(session);
    })
  );

  app.get("/api/sessions/:id", (req, res) => {
    res.json(store.get(req.params.id));
  });

  app.get("/api/sessions/:id/logs", (req, res) => {
    res.json(store.get(req.params.id).logs);
  });

  app.delete(
    "/api/sessions/:id",
    asyncHandler(async (req, res) => {
      if (!store.delete(req.params.id)) {
        throw new WorkflowError("NotFound", `Session ${req.params.id} not found`);
      }
      await store.persist();
      res.status(204).end();
    })
  );

  app.post(
    "/api/sessions/:id/discovery/criteria",
    asyncHandler(async (req, res) => {
      const parsed = criteriaSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => discovery.submitCriteria(ctx, parsed.data)));
    })
  );

  app.post(
    "/api/sessions/:id/discovery/plan/confirm",
    asyncHandler(async (req, res) => {
      const parsed = approvalSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => discovery.confirmPlan(ctx, parsed.data.approvalId)));
    })
  );

  app.post(
    "/api/sessions/:id/discovery/leads/approve",
    asyncHandler(async (req, res) => {
      const parsed = approveLeadsSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      const { approvalId, selection } = parsed.data;
      res.json(await run(req.params.id, (ctx) => discovery.approveLeads(ctx, approvalId, selection)));
    })
  );

  app.post(
    "/api/sessions/:id/discovery/cancel",
    asyncHandler(async (req, res) => {
      const parsed = approvalSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      await run(req.params.id, (ctx) => discovery.cancel(ctx, parsed.data.approvalId));
      res.json({ ok: true, stage: store.get(req.params.id).discovery.stage });
    })
  );

  app.post(
    "/api/sessions/:id/discovery/iterate",
    asyncHandler(async (req, res) => {
      const parsed = iterateSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => discovery.iterate(ctx, parsed.data.changes)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/handoff",
    asyncHandler(async (req, res) => {
      const parsed = handoffSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(
        await run(req.params.id, (ctx) => outreach.receiveHandoff(ctx, findHandoff(ctx.session, parsed.data.handoffId)))
      );
    })
  );

  app.post(
    "/api/sessions/:id/outreach/database/resolve",
    asyncHandler(async (req, res) => {
      res.json(await run(req.params.id, (ctx) => outreach.resolveDatabase(ctx)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/database/confirm",
    asyncHandler(async (req, res) => {
      const parsed = confirmDatabaseSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      const { approvalId, databaseId } = parsed.data;
      res.json(await run(req.params.id, (ctx) => outreach.confirmDatabase(ctx, approvalId, databaseId)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/schema",
    asyncHandler(async (req, res) => {
      const parsed = schemaMappingSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => outreach.resolveSchema(ctx, parsed.data.mapping)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/capture",
    asyncHandler(async (req, res) => {
      const parsed = captureSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => outreach.prepareCapture(ctx, parsed.data.leadIds)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/capture/approve",
    asyncHandler(async (req, res) => {
      const parsed = approvalSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => outreach.approveCapture(ctx, parsed.data.approvalId)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/sends",
    asyncHandler(async (req, res) => {
      const parsed = sendDraftSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.status(201).json(await run(req.params.id, (ctx) => outreach.draftSend(ctx, parsed.data)));
    })
  );

  app.patch(
    "/api/sessions/:id/outreach/sends/:planId",
    asyncHandler(async (req, res) => {
      const parsed = sendDraftSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      const { planId } = req.params;
      res.json(await run(req.params.id, (ctx) => outreach.reviseSend(ctx, planId, parsed.data)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/sends/approve",
    asyncHandler(async (req, res) => {
      const parsed = approvalSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => outreach.approveSend(ctx, parsed.data.approvalId)));
    })
  );

  app.get(
    "/api/sessions/:id/outreach/sends/:planId/report",
    asyncHandler(async (req, res) => {
      const { planId } = req.params;
      res.json(await run(req.params.id, (ctx) => outreach.report(ctx, planId)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/sends/:planId/status-update",
    asyncHandler(async (req, res) => {
      const { planId } = req.params;
      res.json(await run(req.params.id, (ctx) => outreach.prepareStatusUpdate(ctx, planId)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/status-update/approve",
    asyncHandler(async (req, res) => {
      const parsed = approvalSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      res.json(await run(req.params.id, (ctx) => outreach.approveStatusUpdate(ctx, parsed.data.approvalId)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/cancel",
    asyncHandler(async (req, res) => {
      const parsed = approvalSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      await run(req.params.id, (ctx) => outreach.cancel(ctx, parsed.data.approvalId));
      res.json({ ok: true, stage: store.get(req.params.id).outreach.stage });
    })
  );

  app.get(
    "/api/sessions/:id/outreach/emails",
    asyncHandler(async (req, res) => {
      res.json(await outreach.listEmails(contextFor(req.params.id)));
    })
  );

  app.get(
    "/api/sessions/:id/outreach/emails/:sendId",
    asyncHandler(async (req, res) => {
      res.json(await outreach.getEmail(contextFor(req.params.id), req.params.sendId));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/emails/:sendId/schedule",
    asyncHandler(async (req, res) => {
      const parsed = scheduleSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      const { sendId } = req.params;
      res.json(await run(req.params.id, (ctx) => outreach.updateSend(ctx, sendId, parsed.data)));
    })
  );

  app.post(
    "/api/sessions/:id/outreach/emails/:sendId/cancel",
    asyncHandler(async (req, res) => {
      const { sendId } = req.params;
      res.json(await run(req.params.id, (ctx) => outreach.cancelSend(ctx, sendId)));
    })
  );

  app.get(
    "/api/sessions/:id/outreach/emails/:sendId/attachments",
    asyncHandler(async (req, res) => {
      res.json(await outreach.listAttachments(contextFor(req.params.id), req.params.sendId));
    })
  );

  app.get(
    "/api/sessions/:id/outreach/emails/:sendId/attachments/:attachmentId",
    asyncHandler(async (req, res) => {
      const { sendId, attachmentId } = req.params;
      res.json(await outreach.getAttachment(contextFor(req.params.id), sendId, attachmentId));
    })
  );

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isWorkflowError(error)) {
      res.status(error.status).json({
        kind: error.kind,
        message: redactSecrets(error.message, secrets),
        details: error.details
      });
      return;
    }

    const message = redactSecrets(error instanceof Error ? error.message : "Internal server error", secrets);
    console.error("Unhandled error:", message);
    res.status(500).json({ message: message || "Internal server error" });
  });

  return app;
}
