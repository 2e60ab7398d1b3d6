import { describe, it, expect, beforeEach } from "vitest";
import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  importContacts,
  importJobs,
  parseCsvFile,
  parseCsvText,
} from "../src/services/import.service";
import { StoreError, ValidationError } from "../src/utils/errors";
import { MemoryStore } from "./support/memory-store";

let store: MemoryStore;

beforeEach(() => {
  store = new MemoryStore();
});

describe("parseCsvText", () => {
  it("should normalise headers and keep quoted commas", async () => {
    const parsed = await parseCsvText(
      ' Name ,EMAIL,Company_Name\n"Doe, Jane",jane@acme.test,Acme\n'
    );

    expect(parsed.headers).toEqual(["name", "email", "company_name"]);
    expect(parsed.rows).toEqual([
      { name: "Doe, Jane", email: "jane@acme.test", company_name: "Acme" },
    ]);
  });
});

describe("parseCsvFile", () => {
  it("should read rows from disk", async () => {
    const dir = mkdtempSync(join(tmpdir(), "outreach-import-"));
    const file = join(dir, "contacts.csv");
    writeFileSync(file, "name,email,company_name\nRaj Patel,raj@globex.test,Globex\n");

    const parsed = await parseCsvFile(file);

    expect(parsed.rows).toHaveLength(1);
    expect(parsed.rows[0].email).toBe("raj@globex.test");
  });

  it("should reject a path that does not exist", async () => {
    const dir = mkdtempSync(join(tmpdir(), "outreach-import-"));
    const missing = join(dir, "missing.csv");

    const error = await parseCsvFile(missing).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: `Cannot read ${missing}: ENOENT: no such file or directory, open '${missing}'`,
    });
  });
});

describe("importContacts", () => {
  it("should import valid rows and report the bad ones", async () => {
    const csv = await parseCsvText(
      [
        "name,email,company_name,contact_type,phone",
        "Jane Doe,jane@acme.test,Acme,Recruiter,555-0100",
        "Bad Row,not-an-email,Acme,,",
        "Raj Patel,raj@globex.test,Globex,,",
      ].join("\n")
    );

    const result = await importContacts(store, csv);

    expect(result).toEqual({
      imported: 2,
      errors: ["Row 2: email must be a valid email address"],
    });
    const contacts = await store.listContacts();
    expect(contacts.map((c) => [c.name, c.contactType, c.phone])).toEqual([
      ["Jane Doe", "Recruiter", "555-0100"],
      ["Raj Patel", "Other", null],
    ]);
  });

  it("should reject a file without the required columns", async () => {
    const csv = await parseCsvText("name,company_name\nJane,Acme\n");

    await expect(importContacts(store, csv)).rejects.toThrow(
      new ValidationError("CSV is missing required columns", ["email"])
    );
    expect(await store.listContacts()).toEqual([]);
  });

  it("should report an unknown contact type", async () => {
    const csv = await parseCsvText(
      "name,email,company_name,contact_type\nJane,jane@acme.test,Acme,Friend\n"
    );

    const result = await importContacts(store, csv);

    expect(result.imported).toBe(0);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Row 1: contactType /);
  });

  it("should stop on a store failure", async () => {
    const csv = await parseCsvText("name,email,company_name\nJane,jane@acme.test,Acme\n");
    store.failNext("insertContact");

    await expect(importContacts(store, csv)).rejects.toThrow(StoreError);
  });
});

describe("importJobs", () => {
  const header = "company_name,job_title,date_applied,job_link,priority";

  it("should import jobs with defaults", async () => {
    const csv = await parseCsvText(
      `${header}\nAcme,Backend Engineer,2026-10-01,https://jobs.example/1,High\n`
    );

    expect(await importJobs(store, csv)).toEqual({ imported: 1, errors: [] });
    const [job] = await store.listJobs();
    expect(job).toMatchObject({
      companyName: "Acme",
      jobTitle: "Backend Engineer",
      dateApplied: "2026-10-01",
      status: "Applied",
      priority: "High",
      jobLink: "https://jobs.example/1",
      location: null,
    });
  });

  it("should skip links that are already tracked", async () => {
    const csv = await parseCsvText(
      [
        header,
        "Acme,Backend Engineer,2026-10-01,https://jobs.example/1,",
        "Acme,Backend Engineer,2026-10-02,https://jobs.example/1,",
      ].join("\n")
    );

    const result = await importJobs(store, csv);

    expect(result).toEqual({
      imported: 1,
      errors: ["Row 2: Job link already tracked: https://jobs.example/1"],
    });
  });

  it("should reject impossible dates", async () => {
    const csv = await parseCsvText(`${header}\nAcme,SRE,2026-02-30,,\n`);

    expect(await importJobs(store, csv)).toEqual({
      imported: 0,
      errors: ["Row 1: dateApplied is not a valid calendar date"],
    });
  });

  it("should require the job columns", async () => {
    const csv = await parseCsvText("company_name\nAcme\n");

    await expect(importJobs(store, csv)).rejects.toThrow(
      "CSV is missing required columns: job_title; date_applied"
    );
  });
});
