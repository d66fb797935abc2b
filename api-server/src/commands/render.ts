import { DEFAULT_ERROR_CORRECTION, DEFAULT_QUIET_ZONE } from "../config.js";
import { renderQr } from "../lib/qr.js";
import { renderText } from "../lib/glyphs.js";

export interface RenderIo {
    readStdin(): Promise<Uint8Array>;
    write(chunk: string): void;
}

export const USAGE = `termqr - display data as a QR code in the terminal

Usage:
  termqr [DATA...]      Encode DATA (arguments joined with spaces)
  <input> | termqr      Encode standard input bytes when no DATA is given

Options:
  -h, --help            Show this message
  --                    Treat every following argument as DATA

Environment:
  QR_ERROR_CORRECTION   L, M, Q or H (default: M)
  QR_QUIET_ZONE         Border width in modules (default: 4)
`;

export type ParsedArgs = { help: true } | { help: false; data: string[] };

export function parseArgs(args: string[]): ParsedArgs {
    const data: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "--") {
            data.push(...args.slice(i + 1));
            break;
        }
        if (arg === "-h" || arg === "--help") return { help: true };
        // A lone "-" is data, as with most CLIs
        if (arg.startsWith("-") && arg !== "-") {
            throw new Error(`unknown option: ${arg} (use -- to encode it as data)`);
        }
        data.push(arg);
    }
    return { help: false, data };
}

/**
 * Render `args` (or standard input when there are none) as a QR code.
 * Output is monochrome: dark modules print as filled blocks.
 */
export async function runRender(args: string[], io: RenderIo): Promise<void> {
    const parsed = parseArgs(args);
    if (parsed.help) {
        io.write(USAGE);
        return;
    }

    const data = parsed.data.length > 0 ? parsed.data.join(" ") : await io.readStdin();
    if (data.length === 0) {
        throw new Error("empty data");
    }

    // TODO: colour output once 256-colour rendering tells true black apart from the terminal background
    const { image } = renderQr(data, {
        errorCorrectionLevel: DEFAULT_ERROR_CORRECTION,
        quietZone: DEFAULT_QUIET_ZONE,
    });
    io.write(renderText(image));
}
