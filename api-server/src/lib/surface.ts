export type Pixel = "dark" | "light";

/**
 * Thrown when a caller breaks the surface's contract: writing outside its
 * bounds, or touching it after it has been handed to the composer. Signals a
 * programming defect, never bad user input.
 */
export class SurfaceContractError extends Error {
    override readonly name = "SurfaceContractError";
}

export interface SurfaceBuffer {
    width: number;
    height: number;
    pixels: Pixel[];
}

/**
 * Write-only pixel buffer, row-major, filled with the light value on creation.
 * The only read path is `consume()`, which hands the buffer over exactly once.
 */
export class PixelSurface {
    private readonly pixels: Pixel[];
    private consumed = false;

    private constructor(
        readonly width: number,
        readonly height: number,
        private readonly dark: Pixel,
        light: Pixel
    ) {
        this.pixels = new Array<Pixel>(width * height).fill(light);
    }

    static create(width: number, height: number, dark: Pixel = "dark", light: Pixel = "light"): PixelSurface {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
            throw new SurfaceContractError(`invalid surface dimensions ${width}x${height}`);
        }
        return new PixelSurface(width, height, dark, light);
    }

    get isConsumed(): boolean {
        return this.consumed;
    }

    setDark(x: number, y: number): void {
        if (this.consumed) {
            throw new SurfaceContractError("surface mutated after it was consumed");
        }
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
            throw new SurfaceContractError(`pixel (${x}, ${y}) out of bounds for ${this.width}x${this.height} surface`);
        }
        this.pixels[x + y * this.width] = this.dark;
    }

    consume(): SurfaceBuffer {
        if (this.consumed) {
            throw new SurfaceContractError("surface already consumed");
        }
        this.consumed = true;
        return { width: this.width, height: this.height, pixels: this.pixels };
    }
}
