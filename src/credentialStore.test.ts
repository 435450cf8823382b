import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileCredentialStore } from "./credentialStore.js";
import { cookie } from "./testing/fakeHttp.js";

describe("FileCredentialStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cvsync-auth-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns null when nothing was saved", () => {
    expect(new FileCredentialStore(path.join(dir, "auth.storage.json")).load()).toBeNull();
  });

  it("keeps only the jAccount cookie and overwrites earlier saves", () => {
    const file = path.join(dir, "state", "auth.storage.json");
    const store = new FileCredentialStore(file);

    store.save([cookie("JSESSIONID", "other", "oc.sjtu.edu.cn"), cookie("JAAuthCookie", "first")]);
    store.save([cookie("JAAuthCookie", "second")]);

    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({ cookies: [cookie("JAAuthCookie", "second")], origins: [] });
    expect(store.load()).toEqual(cookie("JAAuthCookie", "second"));
  });

  it("ignores a file it cannot read", () => {
    const file = path.join(dir, "auth.storage.json");
    fs.writeFileSync(file, "#LWP-Cookies-2.0\n", "utf8");
    expect(new FileCredentialStore(file).load()).toBeNull();
  });
});
