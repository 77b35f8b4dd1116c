import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import type { IdentityProvider } from "../auth/identity.js";
import { requireAdmin } from "../auth/authorize.js";
import type { DeadlineScanner } from "../deadline/scanner.js";
import { AuthenticationError, ValidationError, isAppError, sanitizeError } from "../errors.js";
import type { Logger } from "../log.js";
import type { TaskService } from "../main.js";
import type { Principal } from "../users/types.js";
import { parseInput, taskFilterSchema } from "../validation.js";

type AppEnv = { Variables: { principal: Principal } };

export interface AppDeps {
  service: TaskService;
  identity: IdentityProvider;
  scanner: DeadlineScanner;
  logger: Logger;
  corsOrigin?: string;
}

async function readJson(c: Context<AppEnv>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError("Invalid JSON body");
  }
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const { service, identity, scanner, logger } = deps;
  const app = new Hono<AppEnv>();

  app.use(
    "*",
    cors({
      origin: deps.corsOrigin ?? "*",
      allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
    }),
  );

  app.use("*", async (c, next) => {
    const started = Date.now();
    await next();
    logger.debug("request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Date.now() - started,
    });
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.use("*", async (c, next) => {
    if (c.req.path === "/health") {
      return next();
    }
    const auth = c.req.header("Authorization");
    if (!auth?.startsWith("Bearer ")) {
      throw new AuthenticationError();
    }
    c.set("principal", await identity.authenticate(auth.slice(7)));
    await next();
  });

  app.onError((err, c) => {
    if (isAppError(err)) {
      return c.json({ error: err.code, message: err.message }, err.httpStatus);
    }
    logger.error("unhandled error", { method: c.req.method, path: c.req.path, error: err });
    return c.json({ error: "internal", message: sanitizeError(err) }, 500);
  });

  app.get("/me", (c) => c.json(c.get("principal")));

  app.get("/tasks", async (c) => {
    const filter = parseInput(taskFilterSchema, {
      status: c.req.query("status"),
      assignee: c.req.query("assignee"),
    });
    return c.json(await service.listTasks(c.get("principal"), filter));
  });

  app.get("/tasks/:id", async (c) => {
    return c.json(await service.getTask(c.get("principal"), c.req.param("id")));
  });

  app.post("/tasks", async (c) => {
    const task = await service.createTask(c.get("principal"), await readJson(c));
    return c.json(task, 201);
  });

  const update = async (c: Context<AppEnv>) => {
    const id = c.req.param("id") ?? "";
    return c.json(await service.updateTask(c.get("principal"), id, await readJson(c)));
  };
  app.patch("/tasks/:id", update);
  app.put("/tasks/:id", update);

  app.delete("/tasks/:id", async (c) => {
    const id = c.req.param("id");
    await service.deleteTask(c.get("principal"), id);
    return c.json({ id, deleted: true });
  });

  app.get("/users", async (c) => {
    return c.json(await service.listUsers(c.get("principal")));
  });

  app.post("/users", async (c) => {
    const user = await service.createUser(c.get("principal"), await readJson(c));
    return c.json(user, 201);
  });

  app.post("/deadline-scans", async (c) => {
    requireAdmin(c.get("principal"), "run deadline scans");
    return c.json(await scanner.scan());
  });

  app.notFound((c) => c.json({ error: "not_found", message: `No route for ${c.req.method} ${c.req.path}` }, 404));

  return app;
}
