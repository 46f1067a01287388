import assert from "node:assert/strict";
import test from "node:test";
import { z } from "zod";
import { load_config_from_env } from "../src/config/schema.ts";

test("defaults apply when nothing is set", () => {
  assert.deepEqual(load_config_from_env({}), {
    logLevel: "info",
    slack: { botToken: "", defaultChannel: "", apiBase: "https://slack.com/api" },
    access: { restrictToAllowedUsers: false, allowedUsers: {}, adminContact: "the bot administrators" },
    dispatch: { caseInsensitive: true, matchMode: "registry", handlerTimeoutMs: 120_000 },
    cloud: { awsDefaultRegion: "us-east-1", openstackOsImageMap: {} },
    teamLinks: {},
  });
});

test("environment values override the defaults", () => {
  const config = load_config_from_env({
    LOG_LEVEL: "DEBUG",
    SLACK_BOT_TOKEN: "test-secret",
    RESTRICT_TO_ALLOWED_USERS: "yes",
    ALLOWED_SLACK_USERS: '{"alice":"U1","bob":"U2"}',
    BOT_ADMIN_CONTACT: "#ops",
    BOT_CASE_INSENSITIVE: "off",
    BOT_MATCH_MODE: "Pattern",
    BOT_HANDLER_TIMEOUT_MS: "30000",
    AWS_DEFAULT_REGION: "eu-west-1",
    OPENSTACK_OS_IMAGE_MAP: '{"fedora":"img-1"}',
    TEAM_LINKS: '{"Runbook":"https://wiki.example.test/runbook"}',
  });
  assert.equal(config.logLevel, "debug");
  assert.equal(config.slack.botToken, "test-secret");
  assert.deepEqual(config.access, {
    restrictToAllowedUsers: true,
    allowedUsers: { alice: "U1", bob: "U2" },
    adminContact: "#ops",
  });
  assert.deepEqual(config.dispatch, { caseInsensitive: false, matchMode: "pattern", handlerTimeoutMs: 30_000 });
  assert.deepEqual(config.cloud, { awsDefaultRegion: "eu-west-1", openstackOsImageMap: { fedora: "img-1" } });
  assert.deepEqual(config.teamLinks, { Runbook: "https://wiki.example.test/runbook" });
});

test("handler timeout is clamped and unparsable numbers fall back", () => {
  assert.equal(load_config_from_env({ BOT_HANDLER_TIMEOUT_MS: "10" }).dispatch.handlerTimeoutMs, 1_000);
  assert.equal(load_config_from_env({ BOT_HANDLER_TIMEOUT_MS: "soon" }).dispatch.handlerTimeoutMs, 120_000);
});

test("unrecognized booleans keep the default", () => {
  assert.equal(load_config_from_env({ RESTRICT_TO_ALLOWED_USERS: "maybe" }).access.restrictToAllowedUsers, false);
});

test("malformed JSON maps fail startup with a named error", () => {
  assert.throws(() => load_config_from_env({ ALLOWED_SLACK_USERS: "{alice" }), { message: "allowed_slack_users_invalid_json" });
  assert.throws(() => load_config_from_env({ TEAM_LINKS: "[" }), { message: "team_links_invalid_json" });
});

test("values of the wrong shape are rejected by the schema", () => {
  assert.throws(() => load_config_from_env({ ALLOWED_SLACK_USERS: '["U1"]' }), z.ZodError);
  assert.throws(() => load_config_from_env({ BOT_MATCH_MODE: "fuzzy" }), z.ZodError);
  assert.throws(() => load_config_from_env({ SLACK_API_BASE: "not a url" }), z.ZodError);
  assert.throws(() => load_config_from_env({ LOG_LEVEL: "verbose" }), z.ZodError);
});
