import "dotenv/config";
import { isErrorCorrectionLevel, type ErrorCorrectionLevel } from "./lib/qr.js";

export const PORT = Number(process.env.PORT ?? 3000);

// Cache settings
export const CACHE_MAX_ENTRIES = Number(process.env.CACHE_MAX_ENTRIES ?? 1_000);
export const CACHE_TTL_MS = Number(process.env.CACHE_TTL_MS ?? 3_600_000); // 1 hour default

// Rate limiting
export const RATE_LIMIT_WINDOW_MS = 60_000; // 1 minute
export const RATE_LIMIT_MAX_REQUESTS = Number(process.env.RATE_LIMIT_MAX ?? 60);

// Input limits
export const MAX_DATA_LENGTH = Number(process.env.MAX_DATA_LENGTH ?? 2_048);
export const MAX_QUIET_ZONE = 16;

function readErrorCorrection(raw: string | undefined): ErrorCorrectionLevel {
    if (raw === undefined || raw === "") return "M";
    const level = raw.toUpperCase();
    if (isErrorCorrectionLevel(level)) return level;
    console.warn(`Ignoring QR_ERROR_CORRECTION="${raw}", expected one of L, M, Q, H`);
    return "M";
}

function readQuietZone(raw: string | undefined): number {
    if (raw === undefined || raw === "") return 4;
    const parsed = Number(raw);
    if (Number.isInteger(parsed) && parsed >= 0 && parsed <= MAX_QUIET_ZONE) return parsed;
    console.warn(`Ignoring QR_QUIET_ZONE="${raw}", expected an integer 0-${MAX_QUIET_ZONE}`);
    return 4;
}

// QR defaults (4-module quiet zone is the minimum the QR standard asks for)
export const DEFAULT_ERROR_CORRECTION = readErrorCorrection(process.env.QR_ERROR_CORRECTION);
export const DEFAULT_QUIET_ZONE = readQuietZone(process.env.QR_QUIET_ZONE);

// Image output
export const SVG_MODULE_SIZE = 10;
export const PNG_OUTPUT_SIZE = Number(process.env.PNG_OUTPUT_SIZE ?? 1000);
export const BG_COLOR = "#ffffff";
export const PIXEL_COLOR = "#000000";
