#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import path from "node:path";
import { format, fromUnixTime } from "date-fns";
import { authenticate, type Session } from "./authSession.js";
import { FileCredentialStore } from "./credentialStore.js";
import { runAria2, writeManifest } from "./downloadAgent.js";
import { CANVAS_CLIENT_URL } from "./endpoints.js";
import { AuthError, DataShapeError, DownloadAgentError, TokenError, TransportError } from "./errors.js";
import { createHttpSession, type HttpSession } from "./http.js";
import { buildManifest, parseSelection, writeSubtitleFiles } from "./manifest.js";
import { DEFAULT_LOCAL_TZ, stampDownloads } from "./metadata.js";
import { ConsoleOperator } from "./operator.js";
import { parsePositiveInt } from "./options.js";
import { loadSnapshot, saveSnapshot } from "./snapshot.js";
import { syncSnapshot, type SyncResult } from "./sync.js";
import { hasDownloadUrls, type Snapshot } from "./types.js";

const DEFAULT_STATE_DIR = process.env.CVS_STATE_DIR ?? path.join(process.cwd(), ".cvsync");
const DEFAULT_SNAPSHOT = process.env.CVS_SNAPSHOT ?? path.join(process.cwd(), "subjects.json");
const DEFAULT_OUTDIR = process.env.CVS_OUTDIR ?? path.join(process.cwd(), "downloads");
const DEFAULT_CONCURRENCY = 4;

const program = new Command();
program.name("cvsync").description("Canvas classroom video sync CLI").version("0.1.0");
program.option("--state-dir <dir>", "where the login cookie and captcha image live", DEFAULT_STATE_DIR);

program
  .command("login")
  .description("Sign in through jAccount and store the session cookie")
  .option("--fresh", "ignore the stored cookie")
  .action(async (opts: { fresh?: boolean }) => {
    await run(async () => {
      const session = await openSession({ fresh: Boolean(opts.fresh) });
      await session.http.dispose();
    });
  });

program
  .command("sync")
  .description("Login if needed → mint subject tokens → refresh course list and media URLs")
  .option("--snapshot <file>", "subjects JSON to resume from and write back", DEFAULT_SNAPSHOT)
  .option("--full", "re-resolve media for every course instead of only new ones")
  .option("--concurrency <count>", "subjects synced in parallel", parsePositiveInt)
  .action(async (opts: { snapshot: string; full?: boolean; concurrency?: number }) => {
    await run(async () => {
      const previous = loadSnapshot(opts.snapshot);
      if (previous?.lastUpdateAt != null) {
        console.log(`🕒 Last synced at ${format(fromUnixTime(previous.lastUpdateAt), "yyyy-MM-dd HH:mm:ss")} (${opts.snapshot})`);
      }
      const mode = opts.full || !previous ? "refresh" : "update";
      const fromEnv = process.env.CVS_CONCURRENCY;
      const concurrency = opts.concurrency ?? (fromEnv ? parsePositiveInt(fromEnv) : DEFAULT_CONCURRENCY);

      const api = await createHttpSession([]);
      try {
        const result = await syncWithSession({ previous, mode, concurrency, api });
        saveSnapshot(opts.snapshot, result.snapshot);
        const courses = result.snapshot.subjects.reduce((sum, s) => sum + s.courses.length, 0);
        console.log(`📄 Wrote ${result.snapshot.subjects.length} subjects, ${courses} courses → ${opts.snapshot}`);

        if (result.failures.length > 0) {
          console.error(`⚠️  ${result.failures.length} subject(s) failed:`);
          for (const failure of result.failures) {
            console.error(`   • ${failure.subject.name} (${failure.stage}): ${failure.error.message}`);
          }
          process.exitCode = 3;
        }
      } finally {
        await api.dispose();
      }
    });
  });

program
  .command("list")
  .description("Show subjects and courses of the snapshot with their ids")
  .option("--snapshot <file>", "subjects JSON", DEFAULT_SNAPSHOT)
  .action(async (opts: { snapshot: string }) => {
    await run(async () => {
      const snapshot = requireSnapshot(opts.snapshot);
      for (const subject of snapshot.subjects) {
        console.log(`${subject.id}  ${subject.name}${subject.token ? "" : "  (no token)"}`);
        for (const course of subject.courses) {
          const marker = hasDownloadUrls(course) ? "✅" : "…";
          console.log(`   ${marker} ${subject.id}:${course.id}  ${course.name}  ${course.startTime ?? ""}`);
        }
      }
    });
  });

program
  .command("download")
  .description("Write the aria2 manifest and subtitles for the selection, then run aria2c")
  .argument("<targets...>", "subjectId (all its courses) or subjectId:courseId")
  .option("--snapshot <file>", "subjects JSON", DEFAULT_SNAPSHOT)
  .option("--outdir <dir>", "download directory", DEFAULT_OUTDIR)
  .option("--with-screen", "also download the screen recording channel")
  .option("--no-subtitles", "skip transcript download")
  .option("--no-run", "only write download.txt, do not start aria2c")
  .option("--stamp-metadata", "write course start time into downloaded videos")
  .option("--tz <zone>", "timezone of course times", process.env.LOCAL_TZ ?? DEFAULT_LOCAL_TZ)
  .action(
    async (
      targets: string[],
      opts: {
        snapshot: string;
        outdir: string;
        withScreen?: boolean;
        subtitles: boolean;
        run: boolean;
        stampMetadata?: boolean;
        tz: string;
      }
    ) => {
      await run(async () => {
        const snapshot = requireSnapshot(opts.snapshot);
        const selection = parseSelection(targets, snapshot.subjects);
        const manifest = buildManifest(selection, snapshot.subjects, Boolean(opts.withScreen));

        const manifestPath = await writeManifest(opts.outdir, manifest.text);
        console.log(`📄 ${manifest.jobs.length} download jobs → ${manifestPath}`);

        if (opts.subtitles) {
          const api = await createHttpSession([]);
          try {
            const subtitles = await writeSubtitleFiles(api, selection, snapshot.subjects, opts.outdir);
            console.log(`📝 Wrote ${subtitles.written.length} subtitle files.`);
            if (subtitles.failures.length > 0) {
              console.error(`⚠️  ${subtitles.failures.length} subtitle file(s) failed; continuing with the download.`);
              process.exitCode = 3;
            }
          } finally {
            await api.dispose();
          }
        }

        if (!opts.run || manifest.jobs.length === 0) {
          console.log("ℹ️  Skipping aria2c.");
          return;
        }

        console.log(`⬇️  Downloading ${manifest.jobs.length} files → ${opts.outdir}`);
        await runAria2(opts.outdir);

        if (opts.stampMetadata) {
          const stamped = await stampDownloads(opts.outdir, manifest.jobs, opts.tz);
          console.log(`🎬 Stamped ${stamped} videos.`);
        }
      });
    }
  );

await program.parseAsync(process.argv);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function stateDir(): string {
  const opts = program.opts<{ stateDir: string }>();
  return opts.stateDir;
}

async function openSession({ fresh }: { fresh: boolean }): Promise<Session> {
  const dir = stateDir();
  const store = new FileCredentialStore(path.join(dir, "auth.storage.json"));
  const operator = new ConsoleOperator({
    captchaPath: path.join(dir, "captcha.jpg"),
    defaultUsername: process.env.CVS_USER,
    initialPassword: process.env.CVS_PASS
  });
  return authenticate({
    clientUrl: CANVAS_CLIENT_URL,
    cookie: fresh ? null : store.load(),
    operator,
    store
  });
}

async function syncWithSession({
  previous,
  mode,
  concurrency,
  api
}: {
  previous: Snapshot | null;
  mode: "refresh" | "update";
  concurrency: number;
  api: HttpSession;
}): Promise<SyncResult> {
  let fresh = false;
  while (true) {
    const session = await openSession({ fresh });
    try {
      return await syncSnapshot({ session: session.http, api, previous, mode, concurrency });
    } catch (err) {
      if (err instanceof TokenError && err.kind === "SessionExpired" && session.resumed && !fresh) {
        console.warn("⚠️  Stored session was rejected by Canvas; logging in again.");
        fresh = true;
        continue;
      }
      throw err;
    } finally {
      await session.http.dispose();
    }
  }
}

function requireSnapshot(snapshotPath: string): Snapshot {
  const snapshot = loadSnapshot(snapshotPath);
  if (!snapshot) {
    console.error(`No snapshot at ${snapshotPath}; run \`cvsync sync\` first.`);
    process.exit(7);
  }
  return snapshot;
}

async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(exitCodeFor(err));
  }
}

function exitCodeFor(err: unknown): number {
  if (err instanceof AuthError) return 2;
  if (err instanceof TokenError) return 3;
  if (err instanceof TransportError) return 4;
  if (err instanceof DataShapeError) return 5;
  if (err instanceof DownloadAgentError) return 6;
  if (err instanceof InvalidArgumentError) return 8;
  return 1;
}
