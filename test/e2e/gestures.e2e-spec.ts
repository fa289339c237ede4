import { INestApplication } from "@nestjs/common";
import request from "supertest";
import { closeTestApp, createTestApp } from "../helpers/test-app.helper";
import {
  createGestureBody,
  createHandLandmarks,
} from "../fixtures/gesture.fixtures";

describe("GesturesController (E2E)", () => {
  let app: INestApplication;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await closeTestApp(app);
  });

  const submitGesture = async (
    overrides: Record<string, unknown> = {},
  ): Promise<number> => {
    const response = await request(app.getHttpServer())
      .post("/gestures")
      .send(createGestureBody(overrides))
      .expect(201);
    return response.body.gesture_id;
  };

  describe("POST /gestures", () => {
    it("should store 21 landmark pairs", async () => {
      await request(app.getHttpServer())
        .post("/gestures")
        .send({ landmarks: createHandLandmarks(), user_id: "u1" })
        .expect(201)
        .expect({ gesture_id: 1 });
    });

    it("should reject fewer than 21 points", async () => {
      const response = await request(app.getHttpServer())
        .post("/gestures")
        .send({ landmarks: createHandLandmarks(20), user_id: "u1" })
        .expect(400);

      expect(response.body.message).toEqual([
        "landmarks must contain exactly 21 [x, y] points",
      ]);
    });

    it("should reject more than 21 points without storing the frame", async () => {
      const response = await request(app.getHttpServer())
        .post("/gestures")
        .send({ landmarks: createHandLandmarks(22), user_id: "u1" })
        .expect(400);

      expect(response.body.message).toEqual([
        "landmarks must contain exactly 21 [x, y] points",
      ]);
      await request(app.getHttpServer()).get("/gestures").expect(200).expect([]);
    });

    it("should reject unknown fields", async () => {
      await request(app.getHttpServer())
        .post("/gestures")
        .send(createGestureBody({ predicted_label: "A" }))
        .expect(400);
    });
  });

  describe("GET /gestures/:id", () => {
    it("should return the stored frame without inference", async () => {
      const id = await submitGesture({ frame_width: 640, frame_height: 480 });

      const response = await request(app.getHttpServer())
        .get(`/gestures/${id}`)
        .expect(200);

      expect(response.body).toMatchObject({
        gesture_id: id,
        user_id: "u1",
        session_id: null,
        landmarks: createHandLandmarks(),
        frame_width: 640,
        frame_height: 480,
        source: "api",
        model_id: null,
        predicted_label: null,
        confidence: null,
        probs: null,
        processing_time_ms: null,
        processed_at: null,
      });
      expect(new Date(response.body.received_at).toISOString()).toBe(
        response.body.received_at,
      );
    });

    it("should return 404 for an unknown gesture", async () => {
      const response = await request(app.getHttpServer())
        .get("/gestures/999")
        .expect(404);

      expect(response.body.message).toBe("Gesture not found");
    });

    it("should reject a non-numeric id", async () => {
      await request(app.getHttpServer()).get("/gestures/abc").expect(400);
    });
  });

  describe("GET /gestures", () => {
    it("should list newest first and filter by user", async () => {
      await submitGesture({ user_id: "u1" });
      await submitGesture({ user_id: "u2" });
      await submitGesture({ user_id: "u1" });

      const all = await request(app.getHttpServer())
        .get("/gestures")
        .expect(200);
      expect(
        all.body.map((gesture: { gesture_id: number }) => gesture.gesture_id),
      ).toEqual([3, 2, 1]);

      const forUser = await request(app.getHttpServer())
        .get("/gestures")
        .query({ user_id: "u2" })
        .expect(200);
      expect(forUser.body).toHaveLength(1);
      expect(forUser.body[0].gesture_id).toBe(2);
    });

    it("should honour the limit", async () => {
      await submitGesture();
      await submitGesture();

      const response = await request(app.getHttpServer())
        .get("/gestures")
        .query({ limit: 1 })
        .expect(200);

      expect(response.body).toHaveLength(1);
      expect(response.body[0].gesture_id).toBe(2);
    });

    it("should reject a limit outside 1-1000", async () => {
      await request(app.getHttpServer())
        .get("/gestures")
        .query({ limit: 0 })
        .expect(400);
    });
  });

  describe("PUT /gestures/:id", () => {
    it("should attach an inference result", async () => {
      const id = await submitGesture();

      await request(app.getHttpServer())
        .put(`/gestures/${id}`)
        .send({
          model_id: 1,
          predicted_label: "A",
          confidence: 0.95,
          probs: { A: 0.95, B: 0.05 },
          processing_time_ms: 15,
        })
        .expect(200)
        .expect({ updated: true });

      const response = await request(app.getHttpServer())
        .get(`/gestures/${id}`)
        .expect(200);

      expect(response.body).toMatchObject({
        model_id: 1,
        predicted_label: "A",
        confidence: 0.95,
        probs: { A: 0.95, B: 0.05 },
        processing_time_ms: 15,
      });
      expect(typeof response.body.processed_at).toBe("string");
    });

    it("should require model, label and confidence together", async () => {
      const id = await submitGesture();

      const response = await request(app.getHttpServer())
        .put(`/gestures/${id}`)
        .send({ predicted_label: "A" })
        .expect(400);

      expect(response.body.message).toBe(
        "model_id, predicted_label and confidence must be set together",
      );
    });

    it("should refuse to change landmarks", async () => {
      const id = await submitGesture();

      const response = await request(app.getHttpServer())
        .put(`/gestures/${id}`)
        .send({ landmarks: createHandLandmarks() })
        .expect(501);

      expect(response.body.message).toBe(
        `Updating gesture ${id} is not supported; only inference results can be attached`,
      );
    });

    it("should return 404 for an unknown gesture", async () => {
      await request(app.getHttpServer())
        .put("/gestures/999")
        .send({ model_id: 1, predicted_label: "A", confidence: 0.9 })
        .expect(404);
    });
  });

  describe("DELETE /gestures/:id", () => {
    it("should delete once and then return 404", async () => {
      const id = await submitGesture();

      await request(app.getHttpServer())
        .delete(`/gestures/${id}`)
        .expect(200)
        .expect({ deleted: true });

      await request(app.getHttpServer()).delete(`/gestures/${id}`).expect(404);
      await request(app.getHttpServer()).get(`/gestures/${id}`).expect(404);
    });
  });
});
