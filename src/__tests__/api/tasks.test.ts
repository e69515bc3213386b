import request from "supertest";
import { Express } from "express";
import { createApp, APP_VERSION } from "../../app";
import { InMemoryTaskRepository } from "../../repositories/task.repository";
import {
  DEFAULT_REASON,
  EXAM_REASON,
  HeuristicPriorityClassifier,
  PriorityService,
} from "../../services/prioritization";

describe("Tasks API", () => {
  let app: Express;
  let priorityService: PriorityService;
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, "info").mockImplementation(() => {});
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});

    priorityService = new PriorityService(new HeuristicPriorityClassifier());
    app = createApp({ repository: new InMemoryTaskRepository(), priorityService });
  });

  afterEach(() => {
    infoSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  async function createTask(body: Record<string, unknown>, query = "") {
    return request(app).post(`/api/tasks${query}`).send(body);
  }

  describe("service endpoints", () => {
    it("GET / reports name and version", async () => {
      const response = await request(app).get("/");

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ message: "Task API", version: APP_VERSION });
    });

    it("GET /health reports healthy", async () => {
      const response = await request(app).get("/health");

      expect(response.body).toEqual({ status: "healthy" });
    });

    it("GET /health/priority-cache reports mode and size", async () => {
      await request(app).post("/api/tasks/priority/analyze").send({ title: "Call bank" });

      const response = await request(app).get("/health/priority-cache");

      expect(response.body).toEqual({ mode: "heuristic", size: 1, inFlight: 0, hits: 0, misses: 1 });
    });

    it("echoes X-Request-ID", async () => {
      const response = await request(app).get("/health").set("X-Request-ID", "req-123");

      expect(response.headers["x-request-id"]).toBe("req-123");
    });

    it("generates a request id when none is sent", async () => {
      const response = await request(app).get("/health");

      expect(response.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe("POST /api/tasks", () => {
    it("creates a task with the given fields", async () => {
      const response = await createTask({
        title: "Test Task",
        description: "This is a test task",
        priority: "medium",
        status: "todo",
      });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        id: 1,
        title: "Test Task",
        description: "This is a test task",
        priority: "medium",
        priorityReason: null,
        status: "todo",
      });
      expect(typeof response.body.createdAt).toBe("string");
      expect(typeof response.body.updatedAt).toBe("string");
    });

    it("applies defaults for priority and status", async () => {
      const response = await createTask({ title: "Bare" });

      expect(response.body).toMatchObject({ priority: "medium", status: "todo", description: null });
    });

    it("uses the suggested priority when asked", async () => {
      const response = await createTask(
        {
          title: "Urgent production incident",
          description: "This is critical and must be fixed ASAP",
          status: "todo",
        },
        "?useAiPriority=true",
      );

      expect(response.status).toBe(201);
      expect(response.body.priority).toBe("high");
      expect(response.body.priorityReason).toBe(
        "High priority: contains urgent keywords 'urgent', 'critical', 'asap'.",
      );
    });

    it("lets the exam rule override an explicit priority", async () => {
      const response = await createTask(
        { title: "Egzamin", description: "jutro", priority: "low" },
        "?useAiPriority=true",
      );

      expect(response.body).toMatchObject({ priority: "high", priorityReason: EXAM_REASON });
    });

    it("ignores the suggestion when useAiPriority=false", async () => {
      const response = await createTask(
        { title: "Egzamin", description: "jutro", priority: "low" },
        "?useAiPriority=false",
      );

      expect(response.body).toMatchObject({ priority: "low", priorityReason: null });
    });

    it("rejects an invalid priority", async () => {
      const response = await createTask({ title: "x", priority: "extreme" });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe("Validation failed");
      expect(response.body.details[0].path).toBe("priority");
    });

    it("rejects an overlong title", async () => {
      const response = await createTask({ title: "t".repeat(201) });

      expect(response.status).toBe(400);
      expect(response.body.details[0].path).toBe("title");
    });

    it("rejects an invalid useAiPriority flag", async () => {
      const response = await createTask({ title: "x" }, "?useAiPriority=yes");

      expect(response.status).toBe(400);
      expect(response.body.details[0].path).toBe("useAiPriority");
    });

    it("rejects malformed JSON", async () => {
      const response = await request(app)
        .post("/api/tasks")
        .set("Content-Type", "application/json")
        .send('{"title": ');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe("Invalid JSON body");
    });
  });

  describe("POST /api/tasks/priority/analyze", () => {
    it("suggests a priority without storing a task", async () => {
      const response = await request(app).post("/api/tasks/priority/analyze").send({
        title: "Fix critical bug in production",
        description: "Users cannot log in, urgent fix needed",
      });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        priority: "high",
        priorityReason: "High priority: contains urgent keywords 'urgent', 'critical'.",
      });

      const list = await request(app).get("/api/tasks");
      expect(list.body).toEqual([]);
    });

    it("handles an empty title", async () => {
      const response = await request(app).post("/api/tasks/priority/analyze").send({ title: "" });

      expect(response.body).toEqual({ priority: "medium", priorityReason: DEFAULT_REASON });
    });

    it("requires a title", async () => {
      const response = await request(app)
        .post("/api/tasks/priority/analyze")
        .send({ description: "no title" });

      expect(response.status).toBe(400);
    });
  });

  describe("GET /api/tasks", () => {
    beforeEach(async () => {
      await createTask({ title: "Todo Task", status: "todo", priority: "low" });
      await createTask({ title: "Done Task", status: "done", priority: "high" });
      await createTask({ title: "Another", status: "done", priority: "low" });
    });

    it("lists all tasks", async () => {
      const response = await request(app).get("/api/tasks");

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(3);
    });

    it("filters by status and priority", async () => {
      const done = await request(app).get("/api/tasks?status=done");
      const doneLow = await request(app).get("/api/tasks?status=done&priority=low");

      expect(done.body.map((t: { title: string }) => t.title)).toEqual(["Done Task", "Another"]);
      expect(doneLow.body.map((t: { title: string }) => t.title)).toEqual(["Another"]);
    });

    it("pages with skip and limit", async () => {
      const response = await request(app).get("/api/tasks?skip=1&limit=1");

      expect(response.body.map((t: { title: string }) => t.title)).toEqual(["Done Task"]);
    });

    it("rejects a limit outside 1..1000", async () => {
      expect((await request(app).get("/api/tasks?limit=0")).status).toBe(400);
      expect((await request(app).get("/api/tasks?limit=1001")).status).toBe(400);
    });

    it("rejects an unknown status", async () => {
      expect((await request(app).get("/api/tasks?status=archived")).status).toBe(400);
    });
  });

  describe("single task routes", () => {
    it("GET returns a task", async () => {
      const created = await createTask({ title: "Read me" });

      const response = await request(app).get(`/api/tasks/${created.body.id}`);

      expect(response.status).toBe(200);
      expect(response.body.title).toBe("Read me");
    });

    it("GET returns 404 for an unknown task", async () => {
      const response = await request(app).get("/api/tasks/999");

      expect(response.status).toBe(404);
      expect(response.body.error).toBe("Task not found");
    });

    it("GET rejects a non-numeric id", async () => {
      const response = await request(app).get("/api/tasks/abc");

      expect(response.status).toBe(400);
      expect(response.body.details[0].path).toBe("taskId");
    });

    it("PATCH updates given fields", async () => {
      const created = await createTask({ title: "Original Title", priority: "low" });

      const response = await request(app)
        .patch(`/api/tasks/${created.body.id}`)
        .send({ title: "Updated Title", status: "done" });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        title: "Updated Title",
        status: "done",
        priority: "low",
      });
    });

    it("PATCH requires at least one field", async () => {
      const created = await createTask({ title: "x" });

      const response = await request(app).patch(`/api/tasks/${created.body.id}`).send({});

      expect(response.status).toBe(400);
    });

    it("PATCH returns 404 for an unknown task", async () => {
      const response = await request(app).patch("/api/tasks/999").send({ status: "done" });

      expect(response.status).toBe(404);
    });

    it("reanalyze stores a fresh suggestion", async () => {
      const created = await createTask({ title: "Exam tomorrow", priority: "low" });

      const response = await request(app).post(
        `/api/tasks/${created.body.id}/reanalyze-priority`,
      );

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ priority: "high", priorityReason: EXAM_REASON });

      const stored = await request(app).get(`/api/tasks/${created.body.id}`);
      expect(stored.body.priority).toBe("high");
    });

    it("reanalyze returns 404 for an unknown task", async () => {
      const response = await request(app).post("/api/tasks/999/reanalyze-priority");

      expect(response.status).toBe(404);
    });

    it("DELETE removes a task", async () => {
      const created = await createTask({ title: "Task to Delete" });

      const response = await request(app).delete(`/api/tasks/${created.body.id}`);
      expect(response.status).toBe(204);

      const after = await request(app).get(`/api/tasks/${created.body.id}`);
      expect(after.status).toBe(404);
    });

    it("DELETE returns 404 for an unknown task", async () => {
      const response = await request(app).delete("/api/tasks/999");

      expect(response.status).toBe(404);
    });
  });
});
