/**
 * time.ts — Wall-clock context in the assistant's home timezone.
 */

export const TIMEZONE = "Europe/Amsterdam";

export interface TimeContext {
    current_time: string;
    date: string;
    weekday: string;
    timezone: string;
    iso: string;
}

const formatter = new Intl.DateTimeFormat("en-GB", {
    timeZone: TIMEZONE,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    weekday: "long",
});

type ZonedParts = Partial<Record<Intl.DateTimeFormatPartTypes, string>>;

function zonedParts(instant: Date): ZonedParts {
    const parts: ZonedParts = {};
    for (const part of formatter.formatToParts(instant)) {
        if (part.type !== "literal") parts[part.type] = part.value;
    }
    return parts;
}

function formatOffset(minutes: number): string {
    const sign = minutes < 0 ? "-" : "+";
    const abs = Math.abs(minutes);
    const hh = String(Math.floor(abs / 60)).padStart(2, "0");
    const mm = String(abs % 60).padStart(2, "0");
    return `${sign}${hh}:${mm}`;
}

/** Current instant rendered in {@link TIMEZONE}. */
export function now(instant: Date = new Date()): TimeContext {
    const p = zonedParts(instant);
    const year = p.year ?? "0000";
    const month = p.month ?? "01";
    const day = p.day ?? "01";
    const hour = p.hour ?? "00";
    const minute = p.minute ?? "00";
    const second = p.second ?? "00";

    // Offset = zoned wall clock read as UTC minus the real instant (whole seconds).
    const wallAsUtc = Date.UTC(
        Number(year),
        Number(month) - 1,
        Number(day),
        Number(hour),
        Number(minute),
        Number(second)
    );
    const truncated = Math.floor(instant.getTime() / 1000) * 1000;
    const offsetMinutes = Math.round((wallAsUtc - truncated) / 60_000);

    const date = `${year}-${month}-${day}`;
    return {
        current_time: `${hour}:${minute}`,
        date,
        weekday: p.weekday ?? "",
        timezone: TIMEZONE,
        iso: `${date}T${hour}:${minute}:${second}${formatOffset(offsetMinutes)}`,
    };
}
