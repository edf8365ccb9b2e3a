import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import type { ApiResponse, JobApi } from "../../src/acquisition/jobApiClient.js";
import { JobCoordinator, extractJobId, readJobStatus } from "../../src/acquisition/jobCoordinator.js";
import { parseResponseDocument } from "../../src/acquisition/responseTree.js";
import { JobFailureError, NetworkError, PollTimeoutError, SchemaError } from "../../src/errors.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

function reply(body: unknown, status = 200): ApiResponse {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return { status, ok: status >= 200 && status < 300, body: text, document: parseResponseDocument(text) };
}

const SETTINGS = { pollIntervalSec: 2, pollMaxIntervalSec: 15, jobTimeoutSec: 900, syncTimeoutSec: 900 };

/** Virtual clock: sleeping advances `now` by the requested delay. */
function virtualTime(): { sleep: (ms: number) => Promise<void>; now: () => number; sleeps: number[] } {
  let current = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
  };
}

function fakeApi() {
  return {
    createJob: sinon.stub<Parameters<JobApi["createJob"]>, ReturnType<JobApi["createJob"]>>(),
    getJob: sinon.stub<Parameters<JobApi["getJob"]>, ReturnType<JobApi["getJob"]>>(),
    getClientUrl: sinon.stub<Parameters<JobApi["getClientUrl"]>, ReturnType<JobApi["getClientUrl"]>>(),
  };
}

describe("acquisition/jobCoordinator", () => {
  describe("extractJobId", () => {
    it("follows the pointer priority list", () => {
      expect(extractJobId(reply({ id: "low", jobId: "high" }))).to.equal("high");
      expect(extractJobId(reply({ data: { jobId: "nested" } }))).to.equal("nested");
      expect(extractJobId(reply({ result: { id: 42 } }))).to.equal("42");
    });

    it("keeps every digit of a numeric identifier beyond double precision", () => {
      expect(extractJobId(reply('{"jobId":12345678901234567890}'))).to.equal("12345678901234567890");
    });

    it("accepts a bare identifier body", () => {
      expect(extractJobId(reply("  job-9f2:a  "))).to.equal("job-9f2:a");
      expect(extractJobId(reply('"quoted-id"'))).to.equal("quoted-id");
    });

    it("rejects the literal null and structured bodies without a known key", () => {
      expect(extractJobId(reply({ jobId: "null" }))).to.equal(null);
      expect(extractJobId(reply("null"))).to.equal(null);
      expect(extractJobId(reply({ message: "queued" }))).to.equal(null);
      expect(extractJobId(reply("accepted, see dashboard"))).to.equal(null);
    });
  });

  describe("readJobStatus", () => {
    it("maps known statuses and keeps the raw value of unknown ones", () => {
      expect(readJobStatus('{"data":{"status":"done"}}')).to.deep.equal({
        status: "done",
        raw: "done",
      });
      expect(readJobStatus('{"status":"queued"}')).to.deep.equal({
        status: "unknown",
        raw: "queued",
      });
      expect(readJobStatus("<html>busy</html>")).to.deep.equal({ status: "unknown", raw: null });
    });
  });

  describe("pollJob", () => {
    it("sleeps with additive backoff until the job exposes a URL", async () => {
      const api = fakeApi();
      api.getJob.onCall(0).resolves(reply({ status: "pending" }));
      api.getJob.onCall(1).resolves(reply({ status: "pending" }));
      api.getJob.onCall(2).resolves(reply({ status: "done", url: "https://cdn.example.test/bundle.car" }));
      const time = virtualTime();
      const logger = new RecordingLogger();
      const coordinator = new JobCoordinator(SETTINGS, { api, logger, sleep: time.sleep, now: time.now });

      const url = await coordinator.pollJob("job-1");

      expect(url).to.equal("https://cdn.example.test/bundle.car");
      expect(time.sleeps).to.deep.equal([2000, 3000]);
      expect(api.getJob.callCount).to.equal(3);
      expect(api.getJob.alwaysCalledWithExactly("job-1")).to.equal(true);
    });

    it("keeps polling when a done job has no URL yet or the poll fails", async () => {
      const api = fakeApi();
      api.getJob.onCall(0).resolves(reply({ status: "done" }));
      api.getJob.onCall(1).resolves(reply("bad gateway", 502));
      api.getJob.onCall(2).resolves(reply({ job: { status: "done" }, links: ["https://cdn.example.test/x.car"] }));
      const time = virtualTime();
      const logger = new RecordingLogger();
      const coordinator = new JobCoordinator(SETTINGS, { api, logger, sleep: time.sleep, now: time.now });

      expect(await coordinator.pollJob("job-1")).to.equal("https://cdn.example.test/x.car");
      expect(time.sleeps).to.deep.equal([2000, 3000]);
      expect(logger.messages).to.include.members(["job_done_without_url", "job_poll_http_error", "job_done"]);
    });

    it("raises JobFailureError on a terminal failure status", async () => {
      const api = fakeApi();
      api.getJob.resolves(reply({ status: "failed", reason: "provider offline" }));
      const time = virtualTime();
      const coordinator = new JobCoordinator(SETTINGS, {
        api,
        logger: new RecordingLogger(),
        sleep: time.sleep,
        now: time.now,
      });

      let caught: unknown;
      try {
        await coordinator.pollJob("job-7");
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(JobFailureError);
      if (caught instanceof JobFailureError) {
        expect(caught.message).to.equal("Job job-7 ended with status: failed");
        expect(caught.context).to.deep.equal({
          httpStatus: 200,
          lastResponse: '{"status":"failed","reason":"provider offline"}',
        });
      }
      expect(time.sleeps).to.deep.equal([]);
    });

    for (const terminal of ["error", "cancelled"]) {
      it(`raises JobFailureError when the job reports ${terminal}`, async () => {
        const api = fakeApi();
        api.getJob.onCall(0).resolves(reply({ status: "pending" }));
        api.getJob.onCall(1).resolves(reply({ data: { status: terminal } }));
        const time = virtualTime();
        const coordinator = new JobCoordinator(SETTINGS, {
          api,
          logger: new RecordingLogger(),
          sleep: time.sleep,
          now: time.now,
        });

        let caught: unknown;
        try {
          await coordinator.pollJob("job-3");
        } catch (error) {
          caught = error;
        }

        expect(caught).to.be.instanceOf(JobFailureError);
        if (caught instanceof JobFailureError) {
          expect(caught.message).to.equal(`Job job-3 ended with status: ${terminal}`);
        }
        expect(time.sleeps).to.deep.equal([2000]);
      });
    }

    it("checks the budget once per iteration before sleeping", async () => {
      const api = fakeApi();
      api.getJob.resolves(reply({ status: "pending" }));
      const time = virtualTime();
      const coordinator = new JobCoordinator(
        { ...SETTINGS, jobTimeoutSec: 5 },
        { api, logger: new RecordingLogger(), sleep: time.sleep, now: time.now },
      );

      let caught: unknown;
      try {
        await coordinator.pollJob("job-1");
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(PollTimeoutError);
      if (caught instanceof PollTimeoutError) {
        expect(caught.code).to.equal("E-TIMEOUT");
        expect(caught.timeoutSec).to.equal(5);
      }
      expect(time.sleeps).to.deep.equal([2000, 3000]);
      expect(api.getJob.callCount).to.equal(3);
    });
  });

  describe("pollSync", () => {
    it("accepts a URL carried by a non-2xx response", async () => {
      const api = fakeApi();
      api.getClientUrl.resolves(reply({ url: "https://cdn.example.test/late.car" }, 503));
      const time = virtualTime();
      const logger = new RecordingLogger();
      const coordinator = new JobCoordinator(SETTINGS, { api, logger, sleep: time.sleep, now: time.now });

      expect(await coordinator.pollSync("f01234")).to.equal("https://cdn.example.test/late.car");
      expect(time.sleeps).to.deep.equal([]);
      expect(logger.messages).to.include.members(["sync_poll_http_error", "sync_url_ready"]);
    });

    it("raises PollTimeoutError with the last response once the budget is spent", async () => {
      const api = fakeApi();
      api.getClientUrl.resolves(reply({ state: "warming" }, 503));
      const time = virtualTime();
      const coordinator = new JobCoordinator(SETTINGS, {
        api,
        logger: new RecordingLogger(),
        sleep: time.sleep,
        now: time.now,
      });

      let caught: unknown;
      try {
        await coordinator.pollSync("f01234", 5);
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(PollTimeoutError);
      if (caught instanceof PollTimeoutError) {
        expect(caught.message).to.equal("Timed out after 5s waiting for a URL");
        expect(caught.timeoutSec).to.equal(5);
        expect(caught.context).to.deep.equal({ httpStatus: 503, lastResponse: '{"state":"warming"}' });
      }
      expect(time.sleeps).to.deep.equal([2000, 3000]);
      expect(api.getClientUrl.callCount).to.equal(3);
    });
  });

  describe("acquireUrl", () => {
    it("uses the asynchronous job path when a job is created", async () => {
      const api = fakeApi();
      api.createJob.resolves(reply({ data: { jobID: "job-42" } }));
      api.getJob.resolves(reply({ status: "done", file: "https://cdn.example.test/a.car" }));
      const time = virtualTime();
      const coordinator = new JobCoordinator(SETTINGS, {
        api,
        logger: new RecordingLogger(),
        sleep: time.sleep,
        now: time.now,
      });

      const acquired = await coordinator.acquireUrl("f01234", "f05678");

      expect(acquired).to.deep.equal({ url: "https://cdn.example.test/a.car", via: "job", jobId: "job-42" });
      expect(api.createJob.firstCall.args).to.deep.equal([{ client: "f01234", provider: "f05678" }]);
      expect(api.getClientUrl.called).to.equal(false);
    });

    it("falls back to the synchronous endpoint when the job cannot be created", async () => {
      const api = fakeApi();
      api.createJob.resolves(reply({ error: "unsupported" }, 404));
      api.getClientUrl.onCall(0).resolves(reply({ state: "warming" }));
      api.getClientUrl.onCall(1).resolves(reply({ url: "https://cdn.example.test/sync.car" }));
      const time = virtualTime();
      const logger = new RecordingLogger();
      const coordinator = new JobCoordinator(SETTINGS, { api, logger, sleep: time.sleep, now: time.now });

      const acquired = await coordinator.acquireUrl("f01234");

      expect(acquired).to.deep.equal({ url: "https://cdn.example.test/sync.car", via: "sync", jobId: null });
      expect(api.createJob.firstCall.args).to.deep.equal([{ client: "f01234" }]);
      expect(api.getClientUrl.alwaysCalledWithExactly("f01234")).to.equal(true);
      expect(api.getJob.called).to.equal(false);
      expect(time.sleeps).to.deep.equal([2000]);
      expect(logger.messages).to.include("job_create_fallback");
    });

    it("falls back when a successful creation carries no identifier", async () => {
      const api = fakeApi();
      api.createJob.resolves(reply({ message: "queued" }));
      api.getClientUrl.resolves(reply({ url: "https://cdn.example.test/sync.car" }));
      const coordinator = new JobCoordinator(SETTINGS, { api, logger: new RecordingLogger(), sleep: async () => {} });

      expect((await coordinator.acquireUrl("f01234")).via).to.equal("sync");
    });

    it("does not fall back on transport failures", async () => {
      const api = fakeApi();
      api.createJob.rejects(new NetworkError("POST /job failed: fetch failed"));
      const coordinator = new JobCoordinator(SETTINGS, { api, logger: new RecordingLogger() });

      let caught: unknown;
      try {
        await coordinator.acquireUrl("f01234");
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(NetworkError);
      expect(api.getClientUrl.called).to.equal(false);
    });

    it("reports a creation failure as SchemaError with the response context", async () => {
      const api = fakeApi();
      api.createJob.resolves(reply("oops", 500));
      const coordinator = new JobCoordinator(SETTINGS, { api, logger: new RecordingLogger() });

      let caught: unknown;
      try {
        await coordinator.createJob("f01234");
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(SchemaError);
      if (caught instanceof SchemaError) {
        expect(caught.context).to.deep.equal({ httpStatus: 500, lastResponse: "oops" });
      }
    });
  });
});
