import QRCode from "qrcode";
import { PixelSurface } from "./surface.js";
import { compose, type RenderedImage } from "./compose.js";

export const ERROR_CORRECTION_LEVELS = ["L", "M", "Q", "H"] as const;
export type ErrorCorrectionLevel = (typeof ERROR_CORRECTION_LEVELS)[number];

export function isErrorCorrectionLevel(value: string): value is ErrorCorrectionLevel {
    return (ERROR_CORRECTION_LEVELS as readonly string[]).includes(value);
}

/** Data that cannot become a QR code (empty, or too large for version 40). */
export class QrEncodeError extends Error {
    override readonly name = "QrEncodeError";
}

export interface QrOptions {
    errorCorrectionLevel: ErrorCorrectionLevel;
    /** Light border around the symbol, in modules. */
    quietZone: number;
}

export interface DrawnQr {
    surface: PixelSurface;
    version: number;
    moduleCount: number;
}

export interface RenderedQr {
    image: RenderedImage;
    version: number;
    moduleCount: number;
    errorCorrectionLevel: ErrorCorrectionLevel;
    quietZone: number;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

// Valid UTF-8 goes through the text path so the encoder can still pick
// numeric or alphanumeric mode; anything else is encoded byte for byte.
function toSegments(data: Uint8Array) {
    try {
        return utf8.decode(data);
    } catch {
        return [{ data: Buffer.from(data), mode: "byte" as const }];
    }
}

function encode(data: string | Uint8Array, errorCorrectionLevel: ErrorCorrectionLevel) {
    if (data.length === 0) {
        throw new QrEncodeError("empty data");
    }
    try {
        return QRCode.create(typeof data === "string" ? data : toSegments(data), { errorCorrectionLevel });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new QrEncodeError(message, { cause: err });
    }
}

/**
 * Encode `data` (text, or raw bytes) and draw every dark module onto a fresh surface, offset by the
 * quiet zone. Surface side = moduleCount + 2 * quietZone.
 */
export function drawQrCode(data: string | Uint8Array, options: QrOptions): DrawnQr {
    const qr = encode(data, options.errorCorrectionLevel);
    const { size } = qr.modules;
    const side = size + 2 * options.quietZone;
    const surface = PixelSurface.create(side, side);

    for (let y = 0; y < size; y++) {
        for (let x = 0; x < size; x++) {
            if (qr.modules.get(y, x)) {
                surface.setDark(x + options.quietZone, y + options.quietZone);
            }
        }
    }

    return { surface, version: qr.version, moduleCount: size };
}

export function renderQr(data: string | Uint8Array, options: QrOptions): RenderedQr {
    const { surface, version, moduleCount } = drawQrCode(data, options);
    return {
        image: compose(surface),
        version,
        moduleCount,
        errorCorrectionLevel: options.errorCorrectionLevel,
        quietZone: options.quietZone,
    };
}
