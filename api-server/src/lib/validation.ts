import { MAX_DATA_LENGTH, MAX_QUIET_ZONE, DEFAULT_ERROR_CORRECTION, DEFAULT_QUIET_ZONE } from "../config.js";
import { isErrorCorrectionLevel, type ErrorCorrectionLevel, type QrOptions } from "./qr.js";

export interface QrRequest extends QrOptions {
    data: string;
}

export interface QrQuery {
    data?: string;
    ec?: string;
    quiet?: string;
}

export function parseData(raw: string | undefined): { data: string } | { error: string } {
    if (raw === undefined || raw.length === 0) {
        return { error: "Missing data. Pass the text to encode as \"data\"." };
    }
    if (raw.length > MAX_DATA_LENGTH) {
        return { error: `Data too long: ${raw.length} characters. Maximum is ${MAX_DATA_LENGTH}.` };
    }
    return { data: raw };
}

export function parseErrorCorrection(
    raw: string | undefined
): { errorCorrectionLevel: ErrorCorrectionLevel } | { error: string } {
    if (raw === undefined || raw === "") return { errorCorrectionLevel: DEFAULT_ERROR_CORRECTION };
    const level = raw.toUpperCase();
    if (!isErrorCorrectionLevel(level)) {
        return { error: `Invalid error correction level: "${raw}". Must be one of L, M, Q, H.` };
    }
    return { errorCorrectionLevel: level };
}

export function parseQuietZone(raw: string | undefined): { quietZone: number } | { error: string } {
    if (raw === undefined || raw === "") return { quietZone: DEFAULT_QUIET_ZONE };
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_QUIET_ZONE) {
        return { error: `Invalid quiet zone: "${raw}". Must be an integer 0-${MAX_QUIET_ZONE}.` };
    }
    return { quietZone: parsed };
}

export function parseQrRequest(query: QrQuery): { request: QrRequest } | { error: string } {
    const data = parseData(query.data);
    if ("error" in data) return data;

    const level = parseErrorCorrection(query.ec);
    if ("error" in level) return level;

    const quiet = parseQuietZone(query.quiet);
    if ("error" in quiet) return quiet;

    return {
        request: { data: data.data, errorCorrectionLevel: level.errorCorrectionLevel, quietZone: quiet.quietZone },
    };
}
