// server.ts

import "dotenv/config";
import { App, json, text } from "./waymark/index";

const app = new App();
const logger = app.getLogger();

app.get("/", () => "Hello, world!");

app.get("/hello/{name}", (req) => text(`Hello, ${req.param("name")}!`));

app.mount("/api", (api) => {
    api.get("/healthz", () => json({ ok: true, ts: new Date().toISOString() })).named("health");
    api.get("/users/{id}/posts/{postId}", (req) => json({ user: req.param("id"), post: req.param("postId") }));
    api.post("/echo", (req) => json({ received: req.text() }));
});

async function main() {
    try {
        await app.listen();
    } catch (err) {
        logger.fatal("Server startup failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
    }
}

// Hardening
process.on("unhandledRejection", (err) =>
    logger.error("unhandledRejection", { error: err instanceof Error ? err.message : String(err) }),
);
process.on("uncaughtException", (err) =>
    logger.fatal("uncaughtException", { error: err.message }),
);

void main();
