import type { Request, Response } from 'express';
import type {
    IncidentInteractions,
    IncomingAction,
    IncomingReport,
    IncomingThreadMessage,
} from '../../services/incident-interactions.js';
import { describeOutcome } from '../../services/incident-lifecycle.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface EventDeps {
    interactions: IncidentInteractions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(body: Record<string, unknown>, key: string): string | undefined {
    const value = body[key];
    return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function missing(fields: string[]): Parsed<never> {
    return { ok: false, error: `Missing or invalid field(s): ${fields.join(', ')}.` };
}

export function parseReport(body: unknown): Parsed<IncomingReport> {
    if (!isRecord(body)) return { ok: false, error: 'Request body must be a JSON object.' };
    const channelId = text(body, 'channelId');
    const ts = text(body, 'ts');
    const userId = text(body, 'userId');
    const messageText = typeof body.text === 'string' ? body.text : undefined;
    if (!channelId || !ts || !userId || messageText === undefined) {
        const absent = ['channelId', 'ts', 'userId'].filter((key) => !text(body, key));
        return missing(messageText === undefined ? [...absent, 'text'] : absent);
    }
    const userName = text(body, 'userName');
    return {
        ok: true,
        value: { channelId, ts, userId, text: messageText, ...(userName && { userName }) },
    };
}

export function parseAction(body: unknown): Parsed<IncomingAction> {
    if (!isRecord(body)) return { ok: false, error: 'Request body must be a JSON object.' };
    const actionId = text(body, 'actionId');
    const actorId = text(body, 'actorId');
    const channelId = text(body, 'channelId');
    const messageTs = text(body, 'messageTs');
    const threadTs = text(body, 'threadTs');
    const value = text(body, 'value');
    if (!actionId || !actorId || !channelId || !messageTs || !threadTs || !value) {
        return missing(
            ['actionId', 'actorId', 'channelId', 'messageTs', 'threadTs', 'value'].filter((key) => !text(body, key)),
        );
    }
    return { ok: true, value: { actionId, actorId, channelId, messageTs, threadTs, value } };
}

export function parseThreadMessage(body: unknown): Parsed<IncomingThreadMessage> {
    if (!isRecord(body)) return { ok: false, error: 'Request body must be a JSON object.' };
    const channelId = text(body, 'channelId');
    if (!channelId) return missing(['channelId']);
    return {
        ok: true,
        value: {
            channelId,
            threadTs: text(body, 'threadTs'),
            userId: text(body, 'userId'),
            botId: text(body, 'botId'),
            subtype: text(body, 'subtype'),
        },
    };
}

/** POST /events/report: a new root message in a watched channel. */
export function handleReportEvent(deps: EventDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const parsed = parseReport(req.body);
        if (!parsed.ok) {
            sendError(res, parsed.error, 400);
            return;
        }
        try {
            const result = await deps.interactions.handleReport(parsed.value);
            sendOk(res, result, result.kind === 'created' ? 201 : 200);
        } catch (err) {
            const mapped = mapError(err);
            sendError(res, mapped.message, mapped.status);
        }
    };
}

/** POST /events/action: a button click on the incident controls. */
export function handleActionEvent(deps: EventDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const parsed = parseAction(req.body);
        if (!parsed.ok) {
            sendError(res, parsed.error, 400);
            return;
        }
        try {
            const result = await deps.interactions.handleAction(parsed.value);
            sendOk(
                res,
                result.kind === 'transition' ? { ...result, message: describeOutcome(result.outcome) } : result,
            );
        } catch (err) {
            const mapped = mapError(err);
            sendError(res, mapped.message, mapped.status);
        }
    };
}

/** POST /events/thread-message: a reply inside an incident thread. */
export function handleThreadMessageEvent(deps: EventDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const parsed = parseThreadMessage(req.body);
        if (!parsed.ok) {
            sendError(res, parsed.error, 400);
            return;
        }
        try {
            sendOk(res, await deps.interactions.handleThreadMessage(parsed.value));
        } catch (err) {
            const mapped = mapError(err);
            sendError(res, mapped.message, mapped.status);
        }
    };
}
