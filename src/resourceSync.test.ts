import { describe, expect, it, vi } from "vitest";
import { TRANSCRIPT_URL, VIDEO_INFO_URL, VIDEO_LIST_URL } from "./endpoints.js";
import { DataShapeError } from "./errors.js";
import {
  indexCourses,
  listCourses,
  mergeCourses,
  refreshCourses,
  resolveMedia,
  resolveTranscripts,
  updateCourses
} from "./resourceSync.js";
import { FakeHttpSession, type RecordedCall } from "./testing/fakeHttp.js";
import type { Course, SubjectToken } from "./types.js";

const token: SubjectToken = { accessToken: "test-token", canvasSubjectId: "98765" };

const records = [
  { courId: 1, videoName: "Lecture 1", courseBeginTime: "2024-09-10 08:00:00", courseEndTime: "2024-09-10 09:40:00", videoId: "v1" },
  { courId: 2, videoName: "Lecture 2", courseBeginTime: "2024-09-12 08:00:00", courseEndTime: "2024-09-12 09:40:00", videoId: "v2" }
];

const mediaFor = (call: RecordedCall) => {
  const id = call.options.multipart?.id ?? "";
  return {
    json: {
      data: {
        videoPlayResponseVoList: [
          { cdviViewNum: 0, rtmpUrlHdv: `https://cdn.test/${id}-cam.mp4?sign=1` },
          { cdviViewNum: 5, rtmpUrlHdv: `https://cdn.test/${id}-screen.mp4?sign=1` }
        ]
      }
    }
  };
};

function vodService(listing: unknown = { code: 0, data: { records } }): FakeHttpSession {
  return new FakeHttpSession().on("POST", VIDEO_LIST_URL, { json: listing }).on("POST", VIDEO_INFO_URL, mediaFor);
}

const resolved = (record: (typeof records)[number]): Course => ({
  id: record.courId,
  name: record.videoName,
  startTime: record.courseBeginTime,
  endTime: record.courseEndTime,
  mediaRef: record.videoId,
  downloadUrls: {
    0: `https://cdn.test/${record.videoId}-cam.mp4?sign=1`,
    1: `https://cdn.test/${record.videoId}-screen.mp4?sign=1`
  }
});

describe("listCourses", () => {
  it("maps records and sends the subject id with the token header", async () => {
    const api = vodService();
    const courses = await listCourses(api, token);

    expect(courses).toEqual([
      { id: 1, name: "Lecture 1", startTime: "2024-09-10 08:00:00", endTime: "2024-09-10 09:40:00", mediaRef: "v1" },
      { id: 2, name: "Lecture 2", startTime: "2024-09-12 08:00:00", endTime: "2024-09-12 09:40:00", mediaRef: "v2" }
    ]);
    expect(api.calls[0].options).toEqual({ data: { canvasCourseId: "98765" }, headers: { token: "test-token" } });
  });

  it("treats code -1 and empty data as no courses", async () => {
    await expect(listCourses(vodService({ code: -1, data: null }), token)).resolves.toEqual([]);
    await expect(listCourses(vodService({ code: 0, data: null }), token)).resolves.toEqual([]);
  });
});

describe("resolveMedia", () => {
  it("classifies the zero view count stream as channel 0", async () => {
    const api = new FakeHttpSession().on("POST", VIDEO_INFO_URL, {
      json: { data: { videoPlayResponseVoList: [{ cdviViewNum: 0, rtmpUrlHdv: "A" }, { cdviViewNum: 5, rtmpUrlHdv: "B" }] } }
    });

    await expect(resolveMedia(api, token, "v1")).resolves.toEqual({ 0: "A", 1: "B" });
    expect(api.calls[0].options).toEqual({
      multipart: { playTypeHls: "true", isAudit: "true", id: "v1" },
      headers: { token: "test-token" }
    });
  });

  it("reads view counts sent as strings", async () => {
    const api = new FakeHttpSession().on("POST", VIDEO_INFO_URL, {
      json: { data: { videoPlayResponseVoList: [{ cdviViewNum: "3", rtmpUrlHdv: "B" }, { cdviViewNum: "0", rtmpUrlHdv: "A" }] } }
    });

    await expect(resolveMedia(api, token, "v1")).resolves.toEqual({ 0: "A", 1: "B" });
  });

  it("fails on a stream without a view count instead of guessing its channel", async () => {
    const api = new FakeHttpSession().on("POST", VIDEO_INFO_URL, {
      json: { data: { videoPlayResponseVoList: [{ rtmpUrlHdv: "A" }, { cdviViewNum: null, rtmpUrlHdv: "B" }] } }
    });
    await expect(resolveMedia(api, token, "v1")).rejects.toBeInstanceOf(DataShapeError);
  });

  it("fails on a view count that is not a number", async () => {
    const api = new FakeHttpSession().on("POST", VIDEO_INFO_URL, {
      json: { data: { videoPlayResponseVoList: [{ cdviViewNum: "many", rtmpUrlHdv: "A" }] } }
    });
    await expect(resolveMedia(api, token, "v1")).rejects.toThrow(/non-numeric view count/);
  });

  it("fails on a stream without a URL", async () => {
    const api = new FakeHttpSession().on("POST", VIDEO_INFO_URL, {
      json: { data: { videoPlayResponseVoList: [{ cdviViewNum: 0 }, { cdviViewNum: 5, rtmpUrlHdv: "B" }] } }
    });
    await expect(resolveMedia(api, token, "v1")).rejects.toBeInstanceOf(DataShapeError);
  });

  it("fails when the response has no data", async () => {
    const api = new FakeHttpSession().on("POST", VIDEO_INFO_URL, { json: { code: 1, data: null } });
    await expect(resolveMedia(api, token, "v1")).rejects.toBeInstanceOf(DataShapeError);
  });
});

describe("resolveTranscripts", () => {
  it("keeps source order and picks the requested language", async () => {
    const api = new FakeHttpSession().on("POST", TRANSCRIPT_URL, {
      json: {
        data: {
          originalList: [
            { bg: 0, ed: 1200, res: "你好", en: "hello" },
            { bg: 1200, ed: 2500, res: "世界" }
          ]
        }
      }
    });

    await expect(resolveTranscripts(api, token, 1)).resolves.toEqual([
      { start: 0, end: 1200, text: "你好" },
      { start: 1200, end: 2500, text: "世界" }
    ]);
    await expect(resolveTranscripts(api, token, 1, "en")).resolves.toEqual([
      { start: 0, end: 1200, text: "hello" },
      { start: 1200, end: 2500, text: "" }
    ]);
    expect(api.calls[0].options.data).toEqual({ courseId: 1, platform: 1 });
  });

  it("returns nothing when there is no transcript", async () => {
    const api = new FakeHttpSession().on("POST", TRANSCRIPT_URL, { json: { data: null } });
    await expect(resolveTranscripts(api, token, 1)).resolves.toEqual([]);
  });
});

describe("refreshCourses / updateCourses", () => {
  it("refresh resolves media for every course", async () => {
    const api = vodService();
    await expect(refreshCourses(api, token)).resolves.toEqual(records.map(resolved));
    expect(api.callsTo("POST", VIDEO_INFO_URL)).toHaveLength(2);
  });

  it("update with fully resolved courses makes no media calls", async () => {
    const previous = records.map(resolved);
    const api = vodService();

    await expect(updateCourses(api, token, previous)).resolves.toEqual(previous);
    expect(api.callsTo("POST", VIDEO_INFO_URL)).toHaveLength(0);
  });

  it("update with nothing cached behaves like refresh", async () => {
    const fromUpdate = vodService();
    const fromRefresh = vodService();

    const updated = await updateCourses(fromUpdate, token, []);
    expect(updated).toEqual(await refreshCourses(fromRefresh, token));
    expect(fromUpdate.calls.map((c) => c.options)).toEqual(fromRefresh.calls.map((c) => c.options));
  });

  it("update resolves new and previously unresolved courses only", async () => {
    const stale: Course = { ...resolved(records[1]), downloadUrls: {} };
    const api = vodService();

    const courses = await updateCourses(api, token, [stale]);

    expect(courses).toEqual([resolved(records[1]), resolved(records[0])]);
    expect(api.callsTo("POST", VIDEO_INFO_URL).map((c) => c.options.multipart?.id)).toEqual(["v1", "v2"]);
  });
});

describe("mergeCourses", () => {
  it("keeps resolved and vanished courses, resolving the rest", async () => {
    const known: Course = { id: "a", name: "A", startTime: null, endTime: null, mediaRef: "ma", downloadUrls: { 0: "url-a" } };
    const gone: Course = { id: "g", name: "G", startTime: null, endTime: null, mediaRef: "mg", downloadUrls: { 0: "url-g" } };
    const fresh: Course = { id: "b", name: "B", startTime: null, endTime: null, mediaRef: "mb" };
    const resolve = vi.fn(async (mediaRef: string) => ({ 0: `url-${mediaRef}` }));

    const merged = await mergeCourses(indexCourses([known, gone]), indexCourses([{ ...known, downloadUrls: undefined }, fresh]), resolve);

    expect([...merged.values()]).toEqual([known, gone, { ...fresh, downloadUrls: { 0: "url-mb" } }]);
    expect(resolve).toHaveBeenCalledTimes(1);
  });
});
