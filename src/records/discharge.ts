import { MissingFieldError } from "../errors.js";
import { MISSING, isRecord, present, readString, readTimestamp } from "./fields.js";
import type { MapOutcome } from "./baby.js";
import type { BabyRecord, DischargeCategory, DischargeRecord, DocumentFields, RawDocument } from "./types.js";

export class DischargeMapper {
  map(raw: RawDocument): MapOutcome<DischargeRecord> {
    const doc: DocumentFields = isRecord(raw.data) ? raw.data : {};
    const uid = readString(doc, "UID");
    if (!uid) {
      return { ok: false, error: new MissingFieldError("UID", undefined) };
    }

    const dischargeStatus = readString(doc, "dischargeStatus");
    const dischargeType = readString(doc, "dischargeType");

    return {
      ok: true,
      record: {
        id: raw.id,
        uid,
        source: "discharges",
        hospital: readString(doc, "hospitalName"),
        dischargeStatus,
        dischargeType,
        outcome:
          dischargeStatus === undefined && dischargeType === undefined
            ? MISSING
            : present(categorizeDischarge(dischargeStatus, dischargeType)),
        criticalReasons: parseCriticalReasons(doc.criticalReasons),
        dischargedAt: readTimestamp(doc.dischargeDate),
      },
    };
  }

  /**
   * Backup records carry their discharge outcome as free text. Only those
   * with a status string describe a discharge.
   */
  fromBackup(baby: BabyRecord): DischargeRecord | undefined {
    if (baby.source !== "babyBackUp" || !baby.dischargedStatusString) return undefined;
    return {
      id: baby.id,
      uid: baby.uid,
      source: "babyBackUp",
      hospital: baby.hospital,
      outcome: present(categorizeStatusString(baby.dischargedStatusString)),
      criticalReasons: [],
      dischargedAt: baby.dischargedAt,
    };
  }
}

export function categorizeDischarge(status: string | undefined, type: string | undefined): DischargeCategory {
  const s = (status ?? "").toLowerCase();
  const t = (type ?? "").toLowerCase();
  if (s === "critical" && t === "home") return "critical_home";
  if (s === "stable" && t === "home") return "stable_home";
  if (s === "critical" && t === "referred") return "critical_referred";
  if (t === "died") return "died";
  return "other";
}

// Emoji are stripped before matching; the app decorates statuses with them
const EMOJI = /[\u{1F000}-\u{1FAFF}\u{2600}-\u{27BF}\u{FE0F}]/gu;

export function categorizeStatusString(statusString: string): DischargeCategory {
  const text = statusString.replace(EMOJI, "").trim();
  const lower = text.toLowerCase();
  if (lower.includes("critical and discharged")) return "critical_home";
  if (lower.includes("discharged according to criteria") || lower.includes("stable")) return "stable_home";
  if (lower.includes("referred out") || lower.includes("critical")) return "critical_referred";
  if (text.includes("मृत्यु हो गई") || lower.includes("died before discharge") || lower.includes("death")) {
    return "died";
  }
  return "other";
}

/**
 * Reasons arrive as arrays, as list-like strings such as
 * "['GA', 'weightLoss>2%']", or as a single value.
 */
export function parseCriticalReasons(raw: unknown): string[] {
  if (Array.isArray(raw)) {
    return raw.map((item) => String(item).trim()).filter((item) => item.length > 0);
  }
  if (typeof raw !== "string") return [];
  const text = raw.trim();
  if (text.length === 0) return [];
  if (!(text.startsWith("[") && text.endsWith("]"))) return [text];

  const quoted = [...text.matchAll(/'([^']*)'|"([^"]*)"/g)].map((match) => (match[1] ?? match[2] ?? "").trim());
  const items = quoted.length > 0 ? quoted : text.slice(1, -1).split(",").map((item) => item.trim());
  return items.filter((item) => item.length > 0);
}
