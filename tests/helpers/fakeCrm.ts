import { Response, type fetch } from "undici";

export const FAKE_CRM_URL = "https://crm.test/api";

export interface FakeCrmRecord {
  id: number;
  [field: string]: unknown;
}

export interface RecordedCall {
  method: string;
  path: string;
  body: unknown;
}

export interface FakeCrm {
  fetchImpl: typeof fetch;
  calls: RecordedCall[];
  groups: FakeCrmRecord[];
  teachers: FakeCrmRecord[];
  schedule: FakeCrmRecord[];
  clients: FakeCrmRecord[];
  reservations: FakeCrmRecord[];
  /** Every request answers 503 while set. */
  down: boolean;
  /** Path → status code to answer with instead of handling. */
  failures: Map<string, number>;
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { "content-type": "application/json" } });
}

function matchesColumns(record: FakeCrmRecord, columns: Record<string, unknown>): boolean {
  return Object.entries(columns).every(([field, value]) => record[field] === value);
}

/**
 * In-process stand-in for the CRM REST API: list/update/delete per entity,
 * with switchable outages.
 */
export function createFakeCrm(): FakeCrm {
  let nextId = 1000;

  const crm: FakeCrm = {
    calls: [],
    groups: [
      { id: 1, name: "Хип-хоп" },
      { id: 2, name: "Контемпорари" },
      { id: 3, name: "Растяжка" }
    ],
    teachers: [
      { id: 7, name: "Ирина", phone: "+79000000007" },
      { id: 8, name: "Максим" }
    ],
    schedule: [
      { id: 501, group_id: 1, date: "2026-10-19", time: "19:00", max_students: 15, current_students: 3 },
      { id: 502, group_id: 2, date: "2026-10-20", time: "20:00", max_students: 12, current_students: 12 },
      { id: 503, group_id: 1, date: "2026-10-21", time: "19:00", max_students: 15, current_students: 0 }
    ],
    clients: [],
    reservations: [],
    down: false,
    failures: new Map(),
    fetchImpl: async (input, init) => {
      const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
      const path = url.startsWith(FAKE_CRM_URL) ? url.slice(FAKE_CRM_URL.length) : url;
      const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
      crm.calls.push({ method: init?.method ?? "GET", path, body });

      if (crm.down) {
        return new Response("Service Unavailable", { status: 503 });
      }
      const failure = crm.failures.get(path);
      if (failure !== undefined) {
        return new Response(`forced failure ${failure}`, { status: failure });
      }

      const data = asRecord(body);
      const columns = asRecord(data.columns);
      const limit = typeof data.limit === "number" ? data.limit : 100;

      switch (path) {
        case "/group/list":
          return json({ data: crm.groups.slice(0, limit) });
        case "/teacher/list":
          return json({ data: crm.teachers.slice(0, limit) });
        case "/schedule/list":
          // exact-match column filters, date included
          return json({ data: crm.schedule.filter((item) => matchesColumns(item, columns)).slice(0, limit) });
        case "/client/list":
          return json({ data: crm.clients.filter((item) => matchesColumns(item, columns)).slice(0, limit) });
        case "/client/update": {
          const client = { id: nextId++, name: String(data.name), phone: String(data.phone) };
          crm.clients.push(client);
          return json(client);
        }
        case "/reservation/list":
          return json({ data: crm.reservations.filter((item) => matchesColumns(item, columns)) });
        case "/reservation/update": {
          const reservation = { id: nextId++, client_id: Number(data.client_id), schedule_id: Number(data.schedule_id) };
          crm.reservations.push(reservation);
          return json(reservation);
        }
        case "/reservation/delete": {
          const index = crm.reservations.findIndex((item) => item.id === data.id);
          if (index < 0) {
            return new Response("reservation not found", { status: 404 });
          }
          crm.reservations.splice(index, 1);
          return json({ success: true });
        }
        default:
          return new Response("unknown endpoint", { status: 404 });
      }
    }
  };
  return crm;
}
