import { timingSafeEqual } from "crypto";
import { NextFunction, Request, RequestHandler, Response } from "express";
import { ILogger } from "../config/logger";

export const ADMIN_TOKEN_HEADER = "x-admin-token";

function tokensMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guards administrative routes with a shared token header.
 */
export function requireAdminToken(expectedToken: string, logger: ILogger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const provided = req.header(ADMIN_TOKEN_HEADER);

        if (provided === undefined || !tokensMatch(provided, expectedToken)) {
            logger.warn({ method: req.method, path: req.originalUrl }, "Rejected admin request");
            res.status(401).json({ error: "Unauthorized" });
            return;
        }

        next();
    };
}
