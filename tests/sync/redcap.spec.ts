import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { RedcapDirectoryClient, parseFlag, parseStudyDate } from "../../server/services/redcap";
import type { DirectoryConfig } from "../../server/config";
import { DirectoryUnavailableError } from "../../server/errors";

const config: DirectoryConfig = {
  apiUrl: "https://redcap.example.org/api/",
  apiToken: "test-token",
  filterLogic: "[enrolled] = '1'",
  recordIdField: "record_id",
  remoteIdField: "firebase_id",
  handlerField: "ra",
  usernameField: "username",
  timeoutMs: 5000,
};

const passThrough = <T>(fn: () => Promise<T>): Promise<T> => fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("RedcapDirectoryClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  describe("buildRequestBody", () => {
    it("asks for a flat JSON record export of the mapped fields", () => {
      const body = new RedcapDirectoryClient(config).buildRequestBody();

      expect(body.get("token")).toBe("test-token");
      expect(body.get("content")).toBe("record");
      expect(body.get("format")).toBe("json");
      expect(body.get("type")).toBe("flat");
      expect(body.get("fields")).toBe("record_id,firebase_id,ra,username");
      expect(body.get("filterLogic")).toBe("[enrolled] = '1'");
      expect(body.get("returnFormat")).toBe("json");
      expect(body.has("forms")).toBe(false);
      expect(body.has("events")).toBe(false);
    });

    it("adds forms and events when configured", () => {
      const body = new RedcapDirectoryClient({
        ...config,
        usernameField: undefined,
        formName: "enrollment",
        eventName: "baseline_arm_1",
      }).buildRequestBody();

      expect(body.get("fields")).toBe("record_id,firebase_id,ra");
      expect(body.get("forms")).toBe("enrollment");
      expect(body.get("events")).toBe("baseline_arm_1");
    });

    it("requests the study window and dropped fields only when they are mapped", () => {
      const body = new RedcapDirectoryClient({
        ...config,
        studyStartField: "start_date",
        studyEndField: "end_date",
        droppedField: "dropped",
        droppedSurveysField: "dropped_surveys",
      }).buildRequestBody();

      expect(body.get("fields")).toBe("record_id,firebase_id,ra,username,start_date,end_date,dropped,dropped_surveys");
    });
  });

  describe("listRecords", () => {
    it("posts the form body and maps records onto directory fields", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse([
          { record_id: "1", firebase_id: "U1", ra: "Alice", username: "p1" },
          { record_id: "2", firebase_id: "", ra: " ", username: "" },
          { record_id: 3, firebase_id: "U3", ra: "Bob" },
        ]),
      );
      const client = new RedcapDirectoryClient(config, { fetchImpl, call: passThrough });

      const records = await client.listRecords();

      expect(records).toEqual([
        { directoryId: "1", remoteId: "U1", handlerLabel: "Alice", username: "p1" },
        { directoryId: "2" },
        { directoryId: "3", remoteId: "U3", handlerLabel: "Bob" },
      ]);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      const [url, init] = fetchImpl.mock.calls[0];
      expect(url).toBe("https://redcap.example.org/api/");
      expect(init?.method).toBe("POST");
      expect(String(init?.body)).toContain("content=record");
    });

    it("maps the study window and dropped flags", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse([
          { record_id: "1", start_date: "03/15/2026", end_date: "2026-06-15", dropped: "0", dropped_surveys: "1" },
          { record_id: "2", start_date: "", end_date: "someday", dropped: "Yes", dropped_surveys: "" },
        ]),
      );
      const client = new RedcapDirectoryClient(
        {
          ...config,
          studyStartField: "start_date",
          studyEndField: "end_date",
          droppedField: "dropped",
          droppedSurveysField: "dropped_surveys",
        },
        { fetchImpl, call: passThrough },
      );

      const records = await client.listRecords();

      expect(records[0]).toMatchObject({
        directoryId: "1",
        studyStartDate: "2026-03-15",
        studyEndDate: "2026-06-15",
        dropped: false,
        droppedSurveys: true,
      });
      expect(records[1]).toMatchObject({ directoryId: "2", dropped: true, droppedSurveys: false });
      expect(records[1].studyStartDate).toBeUndefined();
      expect(records[1].studyEndDate).toBeUndefined();
    });

    it("skips records without a record id", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse([{ record_id: "", firebase_id: "U9" }, { record_id: "4" }]),
      );
      const client = new RedcapDirectoryClient(config, { fetchImpl, call: passThrough });

      expect(await client.listRecords()).toEqual([{ directoryId: "4" }]);
      expect(console.warn).toHaveBeenCalledWith("[Directory] Skipping record without a record id");
    });

    it("reports an HTTP error status as DirectoryUnavailableError", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: "down" }, 503));
      const client = new RedcapDirectoryClient(config, { fetchImpl, call: passThrough });

      const error = await client.listRecords().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DirectoryUnavailableError);
      expect(error).toMatchObject({ status: 503, message: "Directory responded with HTTP 503" });
    });

    it("wraps network failures", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
      const client = new RedcapDirectoryClient(config, { fetchImpl, call: passThrough });

      await expect(client.listRecords()).rejects.toThrow(
        new DirectoryUnavailableError("Directory request failed: fetch failed"),
      );
    });

    it("rejects an error payload returned with a success status", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse({ error: "You do not have permissions to use the API" }),
      );
      const client = new RedcapDirectoryClient(config, { fetchImpl, call: passThrough });

      await expect(client.listRecords()).rejects.toThrow(
        "Directory returned an unusable response: You do not have permissions to use the API",
      );
    });

    it("rejects a payload that is not a record list", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse("ok"));
      const client = new RedcapDirectoryClient(config, { fetchImpl, call: passThrough });

      await expect(client.listRecords()).rejects.toThrow(
        "Directory returned an unusable response: expected an array of records",
      );
    });

    it("uses the global fetch by default", async () => {
      const globalFetch = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ record_id: "1" }]));
      vi.stubGlobal("fetch", globalFetch);
      const client = new RedcapDirectoryClient(config, { call: passThrough });

      expect(await client.listRecords()).toEqual([{ directoryId: "1" }]);
      expect(globalFetch).toHaveBeenCalledTimes(1);
    });

    it("goes through the call wrapper", async () => {
      const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([]));
      let wrapped = 0;
      const call = <T>(fn: () => Promise<T>): Promise<T> => {
        wrapped++;
        return fn();
      };
      const client = new RedcapDirectoryClient(config, { fetchImpl, call });

      await client.listRecords();

      expect(wrapped).toBe(1);
    });
  });
});

describe("parseStudyDate", () => {
  it("normalizes the accepted layouts to YYYY-MM-DD", () => {
    expect(parseStudyDate("2026-3-5")).toBe("2026-03-05");
    expect(parseStudyDate("03/05/2026")).toBe("2026-03-05");
    expect(parseStudyDate("25-12-2026")).toBe("2026-12-25");
  });

  it("reads a dash date as day first, then month first", () => {
    expect(parseStudyDate("03-04-2026")).toBe("2026-04-03");
    expect(parseStudyDate("12-31-2026")).toBe("2026-12-31");
  });

  it("rejects dates that are not on the calendar", () => {
    expect(parseStudyDate("2026-02-30")).toBeUndefined();
    expect(parseStudyDate("13/01/2026")).toBeUndefined();
    expect(parseStudyDate("March 5")).toBeUndefined();
    expect(parseStudyDate(undefined)).toBeUndefined();
  });
});

describe("parseFlag", () => {
  it("treats 1, yes and true as set", () => {
    expect(parseFlag({ dropped: "1" }, "dropped")).toBe(true);
    expect(parseFlag({ dropped: "YES" }, "dropped")).toBe(true);
    expect(parseFlag({ dropped: "true" }, "dropped")).toBe(true);
    expect(parseFlag({ dropped: 1 }, "dropped")).toBe(true);
  });

  it("treats any other present value as unset", () => {
    expect(parseFlag({ dropped: "0" }, "dropped")).toBe(false);
    expect(parseFlag({ dropped: "" }, "dropped")).toBe(false);
  });

  it("leaves a missing or unmapped field undefined", () => {
    expect(parseFlag({}, "dropped")).toBeUndefined();
    expect(parseFlag({ dropped: "1" }, undefined)).toBeUndefined();
  });
});
