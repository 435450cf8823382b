export type EntityId = string | number;

/** 0 is the classroom camera, 1 the screen capture. */
export type Channel = 0 | 1;

export type DownloadUrls = Partial<Record<Channel, string>>;

export interface SubjectToken {
  accessToken: string;
  canvasSubjectId: string;
}

export interface Course {
  id: EntityId;
  name: string;
  startTime: string | null;
  endTime: string | null;
  mediaRef: string;
  downloadUrls?: DownloadUrls;
}

export interface Subject {
  id: EntityId;
  name: string;
  account?: EntityId;
  token?: SubjectToken;
  courses: Course[];
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface DownloadJob {
  url: string;
  outputPath: string;
  channel: Channel;
  title: string;
  startTime: string | null;
}

export interface Snapshot {
  subjects: Subject[];
  /** Unix seconds. */
  lastUpdateAt: number | null;
}

/** Subject id → course ids, both in their string form. */
export type Selection = Map<string, Set<string>>;

export const entityKey = (id: EntityId): string => String(id);

export function hasDownloadUrls(course: Course): boolean {
  return Object.keys(course.downloadUrls ?? {}).length > 0;
}

export function channelEntries(urls: DownloadUrls | undefined): Array<[Channel, string]> {
  const entries: Array<[Channel, string]> = [];
  for (const channel of [0, 1] as const) {
    const url = urls?.[channel];
    if (url) entries.push([channel, url]);
  }
  return entries;
}
