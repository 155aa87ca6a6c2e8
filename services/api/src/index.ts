import { config } from "./config";
import { logger } from "./utils/logger";
import { createApp } from "./app";

const app = createApp();

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}. Shutting down gracefully...`);
    process.exit(0);
};

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

// Unhandled rejection handler
process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Rejection", reason);
});

process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception", error);
    process.exit(1);
});

app.listen(config.port, "0.0.0.0", () => {
    logger.info(`Server running on port ${config.port}`, {
        environment: config.nodeEnv,
        port: config.port,
    });
});

export default app;
