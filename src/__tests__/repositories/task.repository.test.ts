import {
  applyChanges,
  buildTask,
  InMemoryTaskRepository,
} from "../../repositories/task.repository";

describe("InMemoryTaskRepository", () => {
  let repository: InMemoryTaskRepository;

  beforeEach(() => {
    repository = new InMemoryTaskRepository();
  });

  it("assigns increasing ids and defaults", async () => {
    const first = await repository.create({ title: "First" });
    const second = await repository.create({ title: "Second", description: "details" });

    expect(first).toMatchObject({
      id: 1,
      title: "First",
      description: null,
      priority: "medium",
      priorityReason: null,
      status: "todo",
    });
    expect(second.id).toBe(2);
    expect(second.createdAt).toBeInstanceOf(Date);
  });

  it("finds tasks by id", async () => {
    const created = await repository.create({ title: "Find me" });

    await expect(repository.findById(created.id)).resolves.toEqual(created);
    await expect(repository.findById(999)).resolves.toBeNull();
  });

  it("returns copies, not stored objects", async () => {
    const created = await repository.create({ title: "Original" });
    created.title = "Mutated";

    await expect(repository.findById(created.id)).resolves.toMatchObject({ title: "Original" });
  });

  it("filters by status and priority", async () => {
    await repository.create({ title: "a", status: "todo", priority: "high" });
    await repository.create({ title: "b", status: "done", priority: "high" });
    await repository.create({ title: "c", status: "done", priority: "low" });

    const done = await repository.findMany({ status: "done" });
    const doneHigh = await repository.findMany({ status: "done", priority: "high" });

    expect(done.map((t) => t.title)).toEqual(["b", "c"]);
    expect(doneHigh.map((t) => t.title)).toEqual(["b"]);
  });

  it("applies skip and limit after filtering", async () => {
    for (const title of ["a", "b", "c", "d"]) {
      await repository.create({ title });
    }

    const page = await repository.findMany({ skip: 1, limit: 2 });

    expect(page.map((t) => t.title)).toEqual(["b", "c"]);
  });

  it("updates only the given fields", async () => {
    const created = await repository.create({ title: "Title", description: "Keep me" });

    const updated = await repository.update(created.id, { status: "done" });

    expect(updated).toMatchObject({ title: "Title", description: "Keep me", status: "done" });
    await expect(repository.update(999, { status: "done" })).resolves.toBeNull();
  });

  it("deletes tasks", async () => {
    const created = await repository.create({ title: "Gone" });

    await expect(repository.delete(created.id)).resolves.toBe(true);
    await expect(repository.delete(created.id)).resolves.toBe(false);
    await expect(repository.findById(created.id)).resolves.toBeNull();
  });
});

describe("task record helpers", () => {
  const createdAt = new Date("2026-01-01T00:00:00.000Z");
  const later = new Date("2026-01-02T00:00:00.000Z");

  it("applyChanges can clear nullable fields and bumps updatedAt", () => {
    const task = buildTask(1, { title: "t", description: "d", priorityReason: "r" }, createdAt);

    const updated = applyChanges(task, { description: null, priorityReason: null }, later);

    expect(updated).toEqual({
      ...task,
      description: null,
      priorityReason: null,
      updatedAt: later,
    });
    expect(task.description).toBe("d");
  });
});
