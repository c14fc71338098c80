export type IntervalStatus = "power_on" | "power_off" | "uncertain";

export type ParserStrategy = "table" | "script" | "image" | "address";

export type PageStrategy = Exclude<ParserStrategy, "address">;

export interface LocationConfig {
  id: string;
  name: string;
  url: string;
  strategy: ParserStrategy;
  fallbackStrategies?: PageStrategy[];
  groupCount?: number; // group-based locations: groups 1..groupCount
  lookup?: {
    baseUrl: string;
  };
  note?: string; // caveat shown next to the schedule
  emptyMarkers?: string[];
  imageSelector?: string;
}

export interface Interval {
  start: string; // "HH:MM"
  end: string; // "HH:MM", "24:00" closes the day
  status: IntervalStatus;
}

export interface TimetableSnapshot {
  kind: "timetable";
  locationId: string;
  key: string; // group number or resolved address id
  date: string; // "YYYY-MM-DD"
  intervals: Interval[];
  fingerprint: string;
  capturedAt: string;
  confirmedEmpty?: boolean;
}

export interface ImageSnapshot {
  kind: "image";
  locationId: string;
  url: string;
  fingerprint: string;
  capturedAt: string;
}

export type FailureReason =
  | "Timeout"
  | "HttpStatus"
  | "NetworkError"
  | "NoRecognizedFormat"
  | "MalformedStructure"
  | "AddressNotFound"
  | "UpstreamError"
  | "Unexpected";

export type FetchOutcome<T> =
  | { kind: "data"; value: T }
  | { kind: "empty" }
  | { kind: "failure"; reason: FailureReason; message: string };

/** A slot exactly as the upstream labelled it, before grid alignment. */
export interface ProvisionalSlot {
  label: string;
  status: IntervalStatus;
}

export interface ProvisionalGroup {
  key: string;
  slots: ProvisionalSlot[];
  confirmedEmpty?: boolean;
}

/** A key the source was asked about but could not answer for this cycle. */
export interface KeyFailure {
  key: string;
  reason: FailureReason;
  message: string;
}

export type Extraction =
  | { kind: "timetable"; date?: string; groups: ProvisionalGroup[]; failures?: KeyFailure[] }
  | { kind: "image"; url: string };

export type ChangeResult = "new" | "changed" | "unchanged";

export interface Subscriber {
  id: string;
  name?: string;
  locationId?: string;
  key?: string;
  keysByLocation?: Record<string, string>; // last key chosen at each location
  notificationsEnabled: boolean;
  createdAt: string;
}

export interface NotificationKey {
  subscriberId: string;
  locationId: string;
  key: string;
  date: string;
  intervalStart: string;
}

export interface NotificationRecord extends NotificationKey {
  sentAt: string;
}

export type MessagePayload =
  | { kind: "text"; text: string }
  | { kind: "image"; url: string; caption: string };

export interface OutagePeriod {
  start: string;
  end: string;
  status: IntervalStatus;
}

export interface LookupEntry {
  id: string;
  name: string;
}
