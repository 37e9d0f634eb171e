import { describe, it, expect } from "vitest";
import {
  JiraService,
  anchorDate,
  buildWrappedJql,
  quoteJql,
} from "./jira-service";
import { AuthError, RequestError } from "../utils/errors";
import {
  createStubHttp,
  makeIssue,
  paginate,
  testJiraConfig,
} from "../testing/jira-stub";

const NOW = new Date("2026-10-19T12:00:00.000Z");

describe("anchorDate", () => {
  it("subtracts the timeline from today", () => {
    expect(anchorDate(5, NOW)).toBe("2026-10-14");
    expect(anchorDate(365, NOW)).toBe("2025-10-19");
  });
});

describe("quoteJql", () => {
  it("escapes quotes and backslashes", () => {
    expect(quoteJql('o"brien\\x')).toBe('"o\\"brien\\\\x"');
  });
});

describe("buildWrappedJql", () => {
  it("filters by user and window", () => {
    expect(
      buildWrappedJql({
        username: "testuser",
        timelineDays: 5,
        projectFilter: [],
        now: NOW,
      })
    ).toBe(
      '(assignee = "testuser" OR reporter = "testuser") AND updated >= "2026-10-14" ORDER BY updated DESC'
    );
  });

  it("adds the project filter when set", () => {
    expect(
      buildWrappedJql({
        username: "testuser",
        timelineDays: 5,
        projectFilter: ["ARCH", "KG"],
        now: NOW,
      })
    ).toBe(
      '(assignee = "testuser" OR reporter = "testuser") AND updated >= "2026-10-14" AND project in ("ARCH", "KG") ORDER BY updated DESC'
    );
  });
});

describe("JiraService", () => {
  describe("searchIssues", () => {
    it("concatenates every page up to the reported total", async () => {
      const issues = Array.from({ length: 7 }, (_, i) => makeIssue(`KG-${i + 1}`));
      const { http, requests } = createStubHttp((request) => ({
        data: paginate(issues, request),
      }));
      const service = new JiraService({ ...testJiraConfig, pageSize: 3 }, undefined, http);

      const result = await service.searchIssues("project = KG", ["summary", "status"]);

      expect(result.map((issue) => issue.key)).toEqual([
        "KG-1",
        "KG-2",
        "KG-3",
        "KG-4",
        "KG-5",
        "KG-6",
        "KG-7",
      ]);
      expect(requests).toHaveLength(3);
      expect(requests.map((request) => request.params.startAt)).toEqual([0, 3, 6]);
      expect(requests[0].url).toBe("/search");
      expect(requests[0].params).toEqual({
        jql: "project = KG",
        startAt: 0,
        maxResults: 3,
        fields: "summary,status",
      });
    });

    it("makes a single request when everything fits on one page", async () => {
      const issues = [makeIssue("KG-1"), makeIssue("KG-2")];
      const { http, requests } = createStubHttp((request) => ({
        data: paginate(issues, request),
      }));
      const service = new JiraService(testJiraConfig, undefined, http);

      const result = await service.searchIssues("project = KG", []);

      expect(result).toHaveLength(2);
      expect(requests).toHaveLength(1);
    });

    it("stops on an empty page even if the total claims more", async () => {
      const { http, requests } = createStubHttp(() => ({
        data: { startAt: 0, maxResults: 50, total: 10, issues: [] },
      }));
      const service = new JiraService(testJiraConfig, undefined, http);

      await expect(service.searchIssues("project = KG", [])).resolves.toEqual([]);
      expect(requests).toHaveLength(1);
    });

    it("aborts the whole search when a later page fails", async () => {
      const issues = Array.from({ length: 4 }, (_, i) => makeIssue(`KG-${i + 1}`));
      const { http } = createStubHttp((request) =>
        request.params.startAt === 0
          ? { data: paginate(issues, request) }
          : { status: 502, data: {} }
      );
      const service = new JiraService({ ...testJiraConfig, pageSize: 2 }, undefined, http);

      await expect(service.searchIssues("project = KG", [])).rejects.toMatchObject({
        name: "RequestError",
        status: 502,
      });
    });
  });

  describe("errors", () => {
    it("maps 401 to AuthError", async () => {
      const { http } = createStubHttp(() => ({ status: 401, data: {} }));
      const service = new JiraService(testJiraConfig, undefined, http);

      const error = await service.fetchFields().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ status: 401 });
    });

    it("maps 403 to AuthError", async () => {
      const { http } = createStubHttp(() => ({ status: 403, data: {} }));
      const service = new JiraService(testJiraConfig, undefined, http);

      await expect(service.fetchFields()).rejects.toBeInstanceOf(AuthError);
    });

    it("maps other statuses to RequestError with the status code", async () => {
      const { http } = createStubHttp(() => ({ status: 500, data: {} }));
      const service = new JiraService(testJiraConfig, undefined, http);

      const error = await service.fetchFields().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestError);
      expect(error).toMatchObject({
        status: 500,
        url: "/field",
        message: "Jira request to /field failed with HTTP 500",
      });
    });

    it("reports a missing response with a null status", async () => {
      const { http } = createStubHttp(() => null);
      const service = new JiraService(testJiraConfig, undefined, http);

      await expect(service.fetchFields()).rejects.toMatchObject({
        name: "RequestError",
        status: null,
        message: "Jira request to /field failed: Network Error",
      });
    });
  });

  describe("fetchIssue", () => {
    it("requests the issue with the given fields", async () => {
      const { http, requests } = createStubHttp(() => ({
        data: makeIssue("ARCH-9"),
      }));
      const service = new JiraService(testJiraConfig, undefined, http);

      const issue = await service.fetchIssue("ARCH-9", ["customfield_100", "summary"]);

      expect(issue.key).toBe("ARCH-9");
      expect(requests[0].url).toBe("/issue/ARCH-9");
      expect(requests[0].params).toEqual({ fields: "customfield_100,summary" });
    });
  });

  describe("fetchFields", () => {
    it("returns the field definitions", async () => {
      const fields = [
        { id: "summary", name: "Summary", custom: false },
        { id: "customfield_100", name: "Story Points", custom: true },
      ];
      const { http } = createStubHttp(() => ({ data: fields }));
      const service = new JiraService(testJiraConfig, undefined, http);

      await expect(service.fetchFields()).resolves.toEqual(fields);
    });
  });
});
