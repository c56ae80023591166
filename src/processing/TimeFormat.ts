import { InvalidTimeFormatError } from '../errors';

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/**
 * Render seconds as MM:SS.ss, or HH:MM:SS.ss from one hour upward.
 */
export function formatTime(seconds: number): string {
    // Work in whole centiseconds so 59.999 carries into the next minute
    const centis = Math.round(Math.max(0, seconds) * 100);
    const hours = Math.floor(centis / 360000);
    const minutes = Math.floor((centis % 360000) / 6000);
    const secs = ((centis % 6000) / 100).toFixed(2).padStart(5, '0');

    if (hours > 0) {
        return `${pad(hours, 2)}:${pad(minutes, 2)}:${secs}`;
    }
    return `${pad(minutes, 2)}:${secs}`;
}

const PLAIN_SECONDS = /^(\d+(?:\.\d*)?|\.\d+)$/;
const MINUTES_SECONDS = /^(\d+):(\d+(?:\.\d*)?)$/;
const HOURS_MINUTES_SECONDS = /^(\d+):(\d+):(\d+(?:\.\d*)?)$/;

/**
 * Parse "90", "90.5", "1:30", "01:30.25" or "1:02:03.5" into seconds.
 */
export function parseTime(text: string): number {
    const value = text.trim();

    let match = PLAIN_SECONDS.exec(value);
    if (match) {
        return parseFloat(match[1]);
    }

    match = MINUTES_SECONDS.exec(value);
    if (match) {
        return parseInt(match[1], 10) * 60 + parseFloat(match[2]);
    }

    match = HOURS_MINUTES_SECONDS.exec(value);
    if (match) {
        return parseInt(match[1], 10) * 3600 + parseInt(match[2], 10) * 60 + parseFloat(match[3]);
    }

    throw new InvalidTimeFormatError(text);
}
