import { DataSource } from "typeorm";
import { ENTITIES } from "../config/data-source";
import { createTypeOrmStores } from "../stores";
import { Stores } from "../stores/types";
import { ConflictError } from "../utils/errors";
import { ApplicationDraft } from "../utils/types/ApplicationTypes";

const draft = (username: string, overrides: Partial<ApplicationDraft> = {}): ApplicationDraft => ({
  username,
  company: "Acme",
  jobDescription: "",
  originalFilename: "",
  timestamp: "2024-01-01T00:00:00.000Z",
  downloadLink: "",
  viewLink: "",
  status: "applied",
  ...overrides,
});

describe("TypeORM stores", () => {
  let dataSource: DataSource;
  let stores: Stores;

  beforeEach(async () => {
    dataSource = new DataSource({
      type: "sqljs",
      entities: ENTITIES,
      synchronize: true,
      logging: false,
    });
    await dataSource.initialize();
    stores = createTypeOrmStores(dataSource);
  });

  afterEach(() => stores.close());

  it("assigns ids per owner", async () => {
    const a1 = await stores.applications.insert(draft("alice"));
    const a2 = await stores.applications.insert(draft("alice"));
    const b1 = await stores.applications.insert(draft("bob"));

    expect([a1.id, a2.id, b1.id]).toEqual([1, 2, 1]);
  });

  it("lists one owner's rows newest first", async () => {
    await stores.applications.insert(draft("alice", { company: "Old", timestamp: "2024-01-01T00:00:00.000Z" }));
    await stores.applications.insert(draft("alice", { company: "New", timestamp: "2024-03-01T00:00:00.000Z" }));
    await stores.applications.insert(draft("bob", { company: "Other" }));

    const rows = await stores.applications.list("alice");
    expect(rows.map((row) => row.company)).toEqual(["New", "Old"]);
    expect(rows[0].timestamp).toBe("2024-03-01T00:00:00.000Z");
  });

  it("falls back to the download link when no view link is stored", async () => {
    const row = await stores.applications.insert(draft("alice", { downloadLink: "https://files.example/a.pdf" }));

    expect(row.viewLink).toBe("https://files.example/a.pdf");
  });

  it("updates only the supplied fields", async () => {
    await stores.applications.insert(draft("alice", { jobDescription: "Keep me" }));

    const updated = await stores.applications.update("alice", 1, { status: "offer" });

    expect(updated?.status).toBe("offer");
    expect(updated?.jobDescription).toBe("Keep me");
    expect(await stores.applications.update("alice", 2, { status: "offer" })).toBeNull();
    expect(await stores.applications.update("bob", 1, { status: "offer" })).toBeNull();
  });

  it("removes rows and whole collections", async () => {
    await stores.applications.insert(draft("alice"));
    await stores.applications.insert(draft("alice"));

    expect(await stores.applications.remove("alice", 1)).toBe(true);
    expect(await stores.applications.remove("alice", 1)).toBe(false);

    await stores.applications.dropCollection("alice");
    expect(await stores.applications.list("alice")).toEqual([]);
  });

  it("stores credentials", async () => {
    const record = {
      username: "alice",
      passwordHash: "hash",
      role: "admin" as const,
      createdAt: "2024-01-01T00:00:00.000Z",
      updatedAt: "2024-01-01T00:00:00.000Z",
    };
    await stores.credentials.create(record);

    await expect(stores.credentials.create(record)).rejects.toBeInstanceOf(ConflictError);
    expect(await stores.credentials.count()).toBe(1);
    expect((await stores.credentials.find("alice"))?.role).toBe("admin");

    const updated = await stores.credentials.update("alice", { role: "user", updatedAt: "2024-02-01T00:00:00.000Z" });
    expect(updated?.role).toBe("user");
    expect(updated?.passwordHash).toBe("hash");

    expect(await stores.credentials.remove("alice")).toBe(true);
    expect(await stores.credentials.find("alice")).toBeNull();
  });
});
