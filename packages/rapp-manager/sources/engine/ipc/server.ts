import { promises as fs } from "node:fs";
import type { AddressInfo } from "node:net";
import path from "node:path";

import fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";

import type { AccessCaller, LifecycleFailureCode } from "@/types";

import { getLogger } from "../../log.js";
import { requestShutdown } from "../../util/shutdown.js";
import type { RappRuntime } from "../rappRuntime.js";
import { rappParameterNamesDistinct } from "../rapps/rappParameterNamesDistinct.js";

const logger = getLogger("ipc.server");

export const REMOTE_HUB_HEADER = "x-rappman-hub";

export type ControlServerOptions = {
    socketPath: string;
    remote: { host: string; port: number } | null;
    runtime: RappRuntime;
};

export type ControlServer = {
    socketPath: string;
    remoteAddress: string | null;
    close: () => Promise<void>;
};

export type ControlMode = "local" | "remote";

const FAILURE_STATUS: Record<LifecycleFailureCode, number> = {
    unauthorized: 403,
    not_found: 404,
    already_running: 409,
    not_running: 409,
    not_runnable: 409,
    launch_error: 500,
    invalid: 400
};

const PARAMETER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const startSchema = z
    .object({
        rappId: z.string().trim().min(1),
        parameters: z
            .record(z.string())
            .refine((parameters) => Object.keys(parameters).every((name) => PARAMETER_NAME.test(name)), {
                message: "Parameter names must be identifiers"
            })
            .refine((parameters) => rappParameterNamesDistinct(Object.keys(parameters)), {
                message: "Parameter names must differ by more than case"
            })
            .optional()
    })
    .strict();
const inviteSchema = z
    .object({
        hub: z.string().trim().min(1).optional(),
        cancel: z.boolean().optional(),
        applicationNamespace: z.string().trim().optional()
    })
    .strict();
const accessSchema = z
    .object({
        localOnly: z.boolean().optional(),
        whitelist: z.array(z.string()).optional(),
        blacklist: z.array(z.string()).optional()
    })
    .strict();

/**
 * Starts the local control socket and, when configured, the remote control listener.
 */
export async function startControlServer(options: ControlServerOptions): Promise<ControlServer> {
    const socketPath = path.resolve(options.socketPath);
    await fs.mkdir(path.dirname(socketPath), { recursive: true });
    await fs.rm(socketPath, { force: true });

    const localApp = controlAppBuild(options.runtime, "local");
    await localApp.listen({ path: socketPath });
    logger.info({ socket: socketPath }, "start: Control socket ready");

    let remoteApp: FastifyInstance | null = null;
    let remoteAddress: string | null = null;
    if (options.remote) {
        remoteApp = controlAppBuild(options.runtime, "remote");
        try {
            await remoteApp.listen({ host: options.remote.host, port: options.remote.port });
        } catch (error) {
            await localApp.close();
            await fs.rm(socketPath, { force: true });
            throw error;
        }
        remoteAddress = addressFormat(remoteApp.server.address());
        logger.info({ address: remoteAddress }, "start: Remote control listener ready");
    }

    return {
        socketPath,
        remoteAddress,
        close: async () => {
            if (remoteApp) {
                await remoteApp.close();
            }
            await localApp.close();
            await fs.rm(socketPath, { force: true });
            logger.debug("stop: Control server closed");
        }
    };
}

/**
 * Builds the control API. Local mode tags every caller local and adds the admin routes;
 * remote mode requires the hub header and gates every request.
 */
export function controlAppBuild(runtime: RappRuntime, mode: ControlMode): FastifyInstance {
    const app = fastify({ logger: false });

    if (mode === "remote") {
        app.addHook("onRequest", async (request, reply) => {
            const hub = hubHeaderRead(request);
            if (!hub) {
                return reply.status(400).send({ ok: false, code: "invalid", message: `Missing ${REMOTE_HUB_HEADER} header.` });
            }
            const decision = runtime.gate.evaluate({ type: "remote", hub });
            if (!decision.allowed) {
                logger.info({ hub, reason: decision.reason }, "skip: Remote request denied");
                return reply.status(403).send({ ok: false, code: "unauthorized", message: `Hub ${hub} is not allowed.` });
            }
        });
    }

    const callerResolve = (request: FastifyRequest): AccessCaller => {
        const hub = hubHeaderRead(request);
        return mode === "remote" && hub ? { type: "remote", hub } : { type: "local" };
    };

    app.get("/v1/health", async (_request, reply) => {
        return reply.send(runtime.health());
    });

    app.get("/v1/status", async (_request, reply) => {
        return reply.send({ ok: true, status: runtime.manager.status() });
    });

    app.get("/v1/platform", async (_request, reply) => {
        return reply.send({ ok: true, platform: runtime.manager.platformInfo() });
    });

    app.get("/v1/rapps", async (_request, reply) => {
        return reply.send({ ok: true, ...runtime.manager.listRapps() });
    });

    app.post("/v1/rapps/start", async (request, reply) => {
        const body = parseBody(startSchema, request.body, reply);
        if (!body) {
            return reply;
        }
        const caller = callerResolve(request);
        logger.debug({ rappId: body.rappId, caller: caller.type }, "event: Start requested");
        const outcome = await runtime.manager.start(body.rappId, caller, body.parameters ?? {});
        return outcomeSend(reply, outcome);
    });

    app.post("/v1/rapps/stop", async (request, reply) => {
        const outcome = await runtime.manager.stop(callerResolve(request));
        return outcomeSend(reply, outcome);
    });

    app.post("/v1/invite", async (request, reply) => {
        const body = parseBody(inviteSchema, request.body ?? {}, reply);
        if (!body) {
            return reply;
        }
        const caller = callerResolve(request);
        const hub = caller.type === "remote" ? (body.hub ?? caller.hub) : body.hub;
        if (!hub) {
            return reply.status(400).send({ ok: false, code: "invalid", message: "Invite requires a hub." });
        }
        const outcome = await runtime.manager.invite(
            { hub, cancel: body.cancel ?? false, applicationNamespace: body.applicationNamespace ?? null },
            caller
        );
        return outcomeSend(reply, outcome);
    });

    app.get("/v1/access", async (_request, reply) => {
        return reply.send({ ok: true, policy: runtime.gate.policyGet() });
    });

    if (mode === "local") {
        app.put("/v1/access", async (request, reply) => {
            const body = parseBody(accessSchema, request.body, reply);
            if (!body) {
                return reply;
            }
            try {
                const policy = await runtime.policyUpdate(body);
                return reply.send({ ok: true, policy });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                return reply.status(400).send({ ok: false, code: "invalid", message });
            }
        });

        app.post("/v1/shutdown", async (_request, reply) => {
            logger.info("event: Shutdown requested over control socket");
            await reply.send({ ok: true });
            requestShutdown("api");
            return reply;
        });
    }

    return app;
}

function outcomeSend(
    reply: FastifyReply,
    outcome: { ok: true } | { ok: false; code: LifecycleFailureCode; message: string }
): FastifyReply {
    if (outcome.ok) {
        return reply.send(outcome);
    }
    return reply.status(FAILURE_STATUS[outcome.code]).send(outcome);
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, reply: FastifyReply): T | null {
    const result = schema.safeParse(body);
    if (result.success) {
        return result.data;
    }
    reply.status(400).send({
        ok: false,
        code: "invalid",
        message: "Invalid payload",
        details: result.error.flatten()
    });
    return null;
}

function hubHeaderRead(request: FastifyRequest): string | null {
    const value = request.headers[REMOTE_HUB_HEADER];
    const hub = Array.isArray(value) ? value[0] : value;
    const trimmed = hub?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : null;
}

function addressFormat(address: AddressInfo | string | null): string | null {
    if (!address) {
        return null;
    }
    if (typeof address === "string") {
        return address;
    }
    return `${address.address}:${address.port}`;
}
