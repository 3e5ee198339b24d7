import { readFile } from "fs/promises";
import { AppContext } from "../context";
import { NotFoundError, ValidationError } from "../utils/errors";
import { StorageProvider } from "../utils/storage/types";
import { FIXED_STAMP, makeTempDir, removeDir, steppingClock, testContext } from "./helpers/testEnv";

const pdf = (name = "resume.pdf") => ({ originalName: name, buffer: Buffer.from("%PDF-1.4 test") });

describe("ApplicationService", () => {
  let root: string;
  let ctx: AppContext;

  beforeEach(async () => {
    root = await makeTempDir();
    ctx = testContext(root);
  });

  afterEach(() => removeDir(root));

  describe("create", () => {
    it("stores the file and records local links", async () => {
      const record = await ctx.applications.create("demo", { company: "Acme", file: pdf() });

      const link = `/uploads/demo/resume/resume_${FIXED_STAMP}.pdf`;
      expect(record).toEqual({
        id: 1,
        username: "demo",
        company: "Acme",
        jobDescription: "",
        originalFilename: "resume.pdf",
        timestamp: "2024-05-01T12:34:56.789Z",
        downloadLink: link,
        viewLink: link,
        status: "applied",
      });
      expect(await readFile(ctx.local.resolve(`demo/resume/resume_${FIXED_STAMP}.pdf`), "utf8")).toBe(
        "%PDF-1.4 test",
      );
    });

    it("creates rows without a file", async () => {
      const first = await ctx.applications.create("demo", { company: "  Acme  ", jobDescription: "Backend" });
      const second = await ctx.applications.create("demo", { company: "Beta", status: "interview" });

      expect(first).toMatchObject({ id: 1, company: "Acme", jobDescription: "Backend", downloadLink: "" });
      expect(second).toMatchObject({ id: 2, status: "interview" });
    });

    it("requires a company", async () => {
      await expect(ctx.applications.create("demo", { company: "   " })).rejects.toThrow(
        new ValidationError("company is required"),
      );
      await expect(ctx.applications.create("demo", {})).rejects.toBeInstanceOf(ValidationError);
      expect((await ctx.applications.list("demo")).total).toBe(0);
    });

    it("rejects files that do not match the category", async () => {
      await expect(
        ctx.applications.create("demo", { company: "Acme", file: pdf("memo.mp3") }),
      ).rejects.toThrow("Only pdf, doc, docx, txt files are allowed for resume");
      await expect(
        ctx.applications.create("demo", { company: "Acme", category: "photos", file: pdf() }),
      ).rejects.toThrow("category must be one of resume, job_description, audio-note");
    });

    it("accepts audio notes", async () => {
      const record = await ctx.applications.create("demo", {
        company: "Acme",
        category: "audio-note",
        file: pdf("memo.webm"),
      });

      expect(record.downloadLink).toBe(`/uploads/demo/audio-note/memo_${FIXED_STAMP}.webm`);
    });

    it("records local links when the cloud upload fails", async () => {
      const failing: StorageProvider = {
        kind: "azure-blob",
        upload: async () => {
          throw new Error("container unreachable");
        },
      };
      const fallbackCtx = testContext(root, { provider: failing });

      const record = await fallbackCtx.applications.create("demo", { company: "Acme", file: pdf() });

      expect(record.downloadLink).toBe(`/uploads/demo/resume/resume_${FIXED_STAMP}.pdf`);
    });

    it("assigns distinct ids to concurrent creates", async () => {
      const records = await Promise.all(
        Array.from({ length: 8 }, (_, i) => ctx.applications.create("demo", { company: `Company ${i}` })),
      );

      expect(records.map((record) => record.id).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
      expect((await ctx.applications.list("demo")).total).toBe(8);
    });
  });

  describe("list", () => {
    beforeEach(async () => {
      ctx = testContext(root, { clock: steppingClock() });
      for (const company of ["First", "Second", "Third"]) {
        await ctx.applications.create("demo", { company });
      }
    });

    it("returns newest first with totals", async () => {
      const page = await ctx.applications.list("demo");

      expect(page.applications.map((row) => row.company)).toEqual(["Third", "Second", "First"]);
      expect(page).toMatchObject({ total: 3, limit: null, offset: 0 });
    });

    it("slices by offset and limit", async () => {
      const page = await ctx.applications.list("demo", { limit: 1, offset: 1 });

      expect(page.applications.map((row) => row.company)).toEqual(["Second"]);
      expect(page).toMatchObject({ total: 3, limit: 1, offset: 1 });
      expect((await ctx.applications.list("demo", { offset: 5 })).applications).toEqual([]);
    });

    it("rejects negative paging", async () => {
      await expect(ctx.applications.list("demo", { limit: -1 })).rejects.toThrow(
        "limit must be a non-negative integer",
      );
    });

    it("never returns another user's rows", async () => {
      await ctx.applications.create("other", { company: "Private" });

      const page = await ctx.applications.list("demo");
      expect(page.applications.every((row) => row.username === "demo")).toBe(true);
      expect(page.total).toBe(3);
    });
  });

  describe("update", () => {
    it("changes the supplied fields and keeps the creation time", async () => {
      const created = await ctx.applications.create("demo", { company: "Acme", jobDescription: "Backend" });

      const updated = await ctx.applications.update("demo", created.id, { status: "offer", company: "Acme Corp" });

      expect(updated).toEqual({ ...created, status: "offer", company: "Acme Corp" });
    });

    it("treats a blank status as applied", async () => {
      await ctx.applications.create("demo", { company: "Acme", status: "interview" });

      expect((await ctx.applications.update("demo", 1, { status: " " })).status).toBe("applied");
    });

    it("replaces the stored file", async () => {
      await ctx.applications.create("demo", { company: "Acme", file: pdf() });

      const updated = await ctx.applications.update("demo", 1, { file: pdf("cover.docx") });

      expect(updated.originalFilename).toBe("cover.docx");
      expect(updated.viewLink).toBe(`/uploads/demo/resume/cover_${FIXED_STAMP}.docx`);
    });

    it("fails for a missing id and leaves the collection unchanged", async () => {
      await ctx.applications.create("demo", { company: "Acme" });
      const before = await ctx.applications.list("demo");

      await expect(ctx.applications.update("demo", 2, { status: "offer" })).rejects.toBeInstanceOf(NotFoundError);
      await expect(ctx.applications.update("other", 1, { status: "offer" })).rejects.toBeInstanceOf(NotFoundError);
      expect(await ctx.applications.list("demo")).toEqual(before);
    });
  });

  describe("remove", () => {
    it("deletes the row for good", async () => {
      await ctx.applications.create("demo", { company: "Acme" });

      await ctx.applications.remove("demo", 1);

      await expect(ctx.applications.get("demo", 1)).rejects.toThrow(new NotFoundError("Application not found"));
      await expect(ctx.applications.remove("demo", 1)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("adminListAny", () => {
    it("reads another user's rows", async () => {
      await ctx.users.createUser({ username: "demo", password: "test-password" });
      await ctx.applications.create("demo", { company: "Acme" });

      const page = await ctx.applications.adminListAny("demo");
      expect(page.applications.map((row) => row.company)).toEqual(["Acme"]);
    });

    it("fails for an unknown user", async () => {
      await expect(ctx.applications.adminListAny("ghost")).rejects.toThrow(new NotFoundError("User not found"));
    });
  });
});
