import type { FastifyError, FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import { BaseError } from "../errors";

function statusCodeOf(error: FastifyError): number {
    if (error.validation) return 400;
    if (error instanceof BaseError) return error.statusCode;
    return error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
}

const errorHandlerPlugin = fp(
    async function errorHandlerPlugin(fastify: FastifyInstance) {
        fastify.setErrorHandler(async (error: FastifyError, request, reply) => {
            const statusCode = statusCodeOf(error);

            if (statusCode >= 500) {
                request.log.error(error, "Unhandled error");
            } else {
                request.log.warn({ error: error.message, statusCode }, "Request rejected");
            }

            return reply.status(statusCode).send({
                detail: error.message || "Internal Server Error",
            });
        });

        fastify.setNotFoundHandler(async (request, reply) => {
            return reply.status(404).send({
                detail: "Route not found",
            });
        });
    },
    {
        name: "error-handler",
    }
);

export default errorHandlerPlugin;
