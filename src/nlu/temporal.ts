import { addDays, addMonths, format, isValid, parseISO } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

export type Confidence = "high" | "medium" | "low";

export interface TemporalResult {
  /** yyyy-MM-dd in the studio timezone */
  date?: string;
  /** HH:mm */
  time?: string;
  confidence: Confidence;
  rawInput: string;
  error?: string;
}

export type ResolvedDatetime = { ok: true; iso: string; date: string; time: string } | { ok: false; error: string };

export const DEFAULT_CLASS_TIME = "19:00";

const UNRECOGNIZED_DATE = "Не удалось распознать дату";

// JS `\b` is ASCII-only, so Cyrillic words need explicit boundaries.
const L = "(?<![\\p{L}\\p{N}])";
const R = "(?![\\p{L}\\p{N}])";

function word(source: string): RegExp {
  return new RegExp(`${L}${source}${R}`, "u");
}

const TODAY = word("сегодня");
const TOMORROW = word("завтра");
const AFTER_TOMORROW = word("послезавтра");
const WEEKDAY = word("(?:(?:в|во|на)\\s+)?(понедельник|вторник|среда|среду|четверг|пятница|пятницу|суббота|субботу|воскресенье)");
const DAY_NUMBER = word("(?:на\\s+)?(\\d{1,2})(?:-е|-го|\\s*числа)");
const DMY = /(?<![\d.])(\d{1,2})[./](\d{1,2})[./](\d{4})(?!\d)/;
const YMD = /(?<!\d)(\d{4})-(\d{1,2})-(\d{1,2})(?!\d)/;

const HH_MM = /(?<![\d.:])(\d{1,2})[:.](\d{2})(?![\d.:])/;
const HOURS_WORD = word("(\\d{1,2})\\s*(?:час(?:ов|а)?|ч\\.?)(?:\\s*(\\d{1,2})\\s*(?:минут[аы]?|мин\\.?))?");
const HOUR_PERIOD = word("(\\d{1,2})\\s*(вечера|утра|дня)");
const EVENING = word("вечером");
const MORNING = word("утром");
const AFTERNOON = word("дн[её]м");

/** ISO weekday, Monday = 1. */
const WEEKDAYS: Record<string, number> = {
  понедельник: 1,
  вторник: 2,
  среда: 3,
  среду: 3,
  четверг: 4,
  пятница: 5,
  пятницу: 5,
  суббота: 6,
  субботу: 6,
  воскресенье: 7
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Calendar date built from local fields; only used for civil-date arithmetic. */
function civilDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(year, month - 1, day);
  if (!isValid(date) || date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return date;
}

function toKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

/**
 * Russian relative date and time expressions, resolved against the studio
 * timezone. Dates are computed here, never by the model.
 */
export class TemporalParser {
  constructor(
    private readonly timezone: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  parse(text: string, now: Date = this.clock()): TemporalResult {
    const lower = text.toLowerCase().trim();
    const today = parseISO(formatInTimeZone(now, this.timezone, "yyyy-MM-dd"));
    const weekday = Number(formatInTimeZone(now, this.timezone, "i"));

    const dated = this.parseDate(lower, today, weekday, text);
    const [time, timeConfidence] = this.parseTime(lower);

    if (dated.date !== undefined) {
      dated.time = time;
      if (timeConfidence === "low") {
        dated.confidence = "medium";
      }
      return dated;
    }
    if (dated.error !== undefined && dated.error !== UNRECOGNIZED_DATE) {
      return dated;
    }

    if (time !== undefined) {
      return { date: toKey(today), time, confidence: timeConfidence === "low" ? "medium" : timeConfidence, rawInput: text };
    }
    return { confidence: "low", rawInput: text, error: "Не удалось распознать дату или время" };
  }

  /**
   * Full slot resolution: date plus time, defaulting the time to 19:00, as an
   * ISO-8601 string with the studio offset.
   */
  resolve(text: string, now: Date = this.clock()): ResolvedDatetime {
    const parsed = this.parse(text, now);
    if (parsed.date === undefined) {
      return { ok: false, error: parsed.error ?? "Не удалось распознать дату или время" };
    }
    const time = parsed.time ?? DEFAULT_CLASS_TIME;
    const instant = fromZonedTime(`${parsed.date}T${time}:00`, this.timezone);
    return {
      ok: true,
      iso: formatInTimeZone(instant, this.timezone, "yyyy-MM-dd'T'HH:mm:ssXXX"),
      date: parsed.date,
      time
    };
  }

  private parseDate(text: string, today: Date, weekday: number, rawInput: string): TemporalResult {
    const found = (date: Date): TemporalResult => ({ date: toKey(date), confidence: "high", rawInput });

    if (TODAY.test(text)) return found(today);
    if (AFTER_TOMORROW.test(text)) return found(addDays(today, 2));
    if (TOMORROW.test(text)) return found(addDays(today, 1));

    const weekdayName = text.match(WEEKDAY)?.[1];
    const target = weekdayName ? WEEKDAYS[weekdayName] : undefined;
    if (target !== undefined) {
      let ahead = target - weekday;
      if (ahead <= 0) {
        ahead += 7;
      }
      return found(addDays(today, ahead));
    }

    const dayNumber = text.match(DAY_NUMBER)?.[1];
    if (dayNumber !== undefined) {
      const n = Number(dayNumber);
      const thisMonth = civilDate(today.getFullYear(), today.getMonth() + 1, n);
      if (thisMonth && thisMonth >= today) {
        return found(thisMonth);
      }
      const next = addMonths(today, 1);
      const nextMonth = civilDate(next.getFullYear(), next.getMonth() + 1, n);
      if (nextMonth) {
        return found(nextMonth);
      }
      return { confidence: "low", rawInput, error: `Неверная дата: ${n} число` };
    }

    const dmy = text.match(DMY);
    const ymd = text.match(YMD);
    const absolute = dmy
      ? civilDate(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]))
      : ymd
        ? civilDate(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]))
        : undefined;
    if (absolute) {
      if (absolute < today) {
        return {
          confidence: "low",
          rawInput,
          error: `Прошедшая дата: ${format(absolute, "dd.MM.yyyy")}. Предлагаю ближайшее занятие.`
        };
      }
      return found(absolute);
    }

    return { confidence: "low", rawInput, error: UNRECOGNIZED_DATE };
  }

  private parseTime(text: string): [string | undefined, Confidence] {
    for (const pattern of [HH_MM, HOURS_WORD]) {
      const match = text.match(pattern);
      if (!match) {
        continue;
      }
      const hour = Number(match[1]);
      const minute = match[2] ? Number(match[2]) : 0;
      if (hour <= 23 && minute <= 59) {
        return [`${pad(hour)}:${pad(minute)}`, "high"];
      }
    }

    const period = text.match(HOUR_PERIOD);
    if (period) {
      const hour = Number(period[1]);
      if (hour < 1 || hour > 12) {
        return [undefined, "low"];
      }
      if (period[2] === "утра") {
        return [`${pad(hour === 12 ? 0 : hour)}:00`, "high"];
      }
      if (period[2] === "вечера") {
        return [`${pad(hour === 12 ? 0 : hour + 12)}:00`, "high"];
      }
      return [`${pad(hour === 12 ? 12 : hour + 12)}:00`, "high"];
    }

    if (EVENING.test(text)) return ["19:00", "low"];
    if (MORNING.test(text)) return ["10:00", "low"];
    if (AFTERNOON.test(text)) return ["14:00", "low"];
    return [undefined, "low"];
  }
}

/** "2026-10-19T19:00:00+10:00" → "19.10.2026 19:00", reading the wall-clock fields as stored. */
export function formatResolvedForDisplay(iso: string): string {
  const match = iso.match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})/);
  if (!match) {
    return iso;
  }
  return `${match[3]}.${match[2]}.${match[1]} ${match[4]}:${match[5]}`;
}
