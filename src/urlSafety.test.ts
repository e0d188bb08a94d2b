import test from "node:test";
import assert from "node:assert/strict";
import { assertPublicUrl, isBlockedHost, isPrivateIp, parseHttpUrl } from "./urlSafety.ts";

test("isPrivateIp recognizes loopback, private and link-local ranges", () => {
  assert.equal(isPrivateIp("127.0.0.1"), true);
  assert.equal(isPrivateIp("10.1.2.3"), true);
  assert.equal(isPrivateIp("172.20.0.5"), true);
  assert.equal(isPrivateIp("192.168.1.10"), true);
  assert.equal(isPrivateIp("169.254.169.254"), true);
  assert.equal(isPrivateIp("[::1]"), true);
  assert.equal(isPrivateIp("::ffff:192.168.0.1"), true);
  assert.equal(isPrivateIp("fd12:3456::1"), true);
  assert.equal(isPrivateIp("172.32.0.1"), false);
  assert.equal(isPrivateIp("93.184.216.34"), false);
  assert.equal(isPrivateIp("youtube.com"), false);
});

test("isBlockedHost rejects local names", () => {
  assert.equal(isBlockedHost("localhost"), true);
  assert.equal(isBlockedHost("api.localhost"), true);
  assert.equal(isBlockedHost("printer.local"), true);
  assert.equal(isBlockedHost(""), true);
  assert.equal(isBlockedHost("www.instagram.com"), false);
});

test("parseHttpUrl only accepts http and https", () => {
  assert.equal(parseHttpUrl("https://x.com/user/status/1")?.hostname, "x.com");
  assert.equal(parseHttpUrl("file:///etc/passwd"), null);
  assert.equal(parseHttpUrl("youtube.com/watch?v=1"), null);
});

test("assertPublicUrl rejects hosts resolving to private addresses", async () => {
  const lookup = async (host: string) =>
    host === "intranet.example" ? [{ address: "93.184.216.34" }, { address: "10.0.0.8" }] : [{ address: "93.184.216.34" }];

  await assertPublicUrl("https://video.example/clip", lookup);
  await assert.rejects(assertPublicUrl("https://intranet.example/clip", lookup), {
    message: "blocked private address for host intranet.example"
  });
  await assert.rejects(assertPublicUrl("http://localhost:5000/", lookup), { message: "blocked host: localhost" });
  await assert.rejects(assertPublicUrl("gopher://video.example", lookup), { message: "not an http(s) URL" });
});
