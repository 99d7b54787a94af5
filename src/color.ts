import { ErrorCodes, ModelError } from "./errors";

const COLOR_PATTERN = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

export class Color {
	private constructor(
		readonly red: number,
		readonly green: number,
		readonly blue: number
	) { }

	/** Parse `#rrggbb` (either case). */
	static parse(value: string): Color {
		const match = COLOR_PATTERN.exec(value);
		if (!match) {
			throw new ModelError(ErrorCodes.INVALID_COLOR, `Invalid color "${value}", expected #rrggbb`, { value });
		}
		return new Color(parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16));
	}

	/** Add delta to every channel, clamped to 0..255. */
	shift(delta: number): Color {
		return new Color(clamp(this.red + delta), clamp(this.green + delta), clamp(this.blue + delta));
	}

	toString(): string {
		return `#${hex(this.red)}${hex(this.green)}${hex(this.blue)}`;
	}
}

function clamp(channel: number): number {
	return Math.max(0, Math.min(255, channel));
}

function hex(channel: number): string {
	return channel.toString(16).toUpperCase().padStart(2, "0");
}
