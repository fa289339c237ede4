import { INestApplication } from "@nestjs/common";
import request from "supertest";
import { closeTestApp, createTestApp } from "../helpers/test-app.helper";

describe("PredictionsController (E2E)", () => {
  let app: INestApplication;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await closeTestApp(app);
  });

  const queuePrediction = async (
    body: Record<string, unknown> = {},
  ): Promise<number> => {
    const response = await request(app.getHttpServer())
      .post("/predictions")
      .send(body)
      .expect(201);
    return response.body.prediction_id;
  };

  describe("POST /predictions", () => {
    it("should queue a job", async () => {
      await request(app.getHttpServer())
        .post("/predictions")
        .send({
          requestor_user_id: "u1",
          session_id: "s1",
          model_id: 1,
          params: { batch_name: "nightly" },
        })
        .expect(201)
        .expect({ prediction_id: 1, status: "queued" });

      const response = await request(app.getHttpServer())
        .get("/predictions/1")
        .expect(200);

      expect(response.body).toMatchObject({
        prediction_id: 1,
        requestor_user_id: "u1",
        session_id: "s1",
        model_id: 1,
        status: "queued",
        params: { batch_name: "nightly" },
        completed_at: null,
        output_text: null,
        confidence: null,
        latency_ms: null,
        error_message: null,
      });
    });

    it("should default params to an empty object", async () => {
      const id = await queuePrediction();

      const response = await request(app.getHttpServer())
        .get(`/predictions/${id}`)
        .expect(200);

      expect(response.body.params).toEqual({});
    });

    it("should not accept a terminal status on creation", async () => {
      await request(app.getHttpServer())
        .post("/predictions")
        .send({ status: "succeeded" })
        .expect(400);
    });
  });

  describe("PUT /predictions/:id", () => {
    it("should complete a queued job once", async () => {
      const id = await queuePrediction({ session_id: "s1" });

      await request(app.getHttpServer())
        .put(`/predictions/${id}`)
        .send({ output_text: "HELLO", confidence: 0.91, latency_ms: 120 })
        .expect(200)
        .expect({ updated: true });

      const response = await request(app.getHttpServer())
        .get(`/predictions/${id}`)
        .expect(200);
      expect(response.body).toMatchObject({
        status: "succeeded",
        output_text: "HELLO",
        confidence: 0.91,
        latency_ms: 120,
        error_message: null,
      });
      expect(typeof response.body.completed_at).toBe("string");

      const conflict = await request(app.getHttpServer())
        .put(`/predictions/${id}`)
        .send({ output_text: "WORLD" })
        .expect(409);
      expect(conflict.body.message).toBe(
        `Prediction ${id} is already succeeded`,
      );
    });

    it("should mark the job failed when an error message is given", async () => {
      const id = await queuePrediction();

      await request(app.getHttpServer())
        .put(`/predictions/${id}`)
        .send({ error_message: "model artifact missing" })
        .expect(200);

      const response = await request(app.getHttpServer())
        .get(`/predictions/${id}`)
        .expect(200);
      expect(response.body).toMatchObject({
        status: "failed",
        error_message: "model artifact missing",
        output_text: null,
      });
    });

    it("should require output_text for a successful completion", async () => {
      const id = await queuePrediction();

      const response = await request(app.getHttpServer())
        .put(`/predictions/${id}`)
        .send({ confidence: 0.5 })
        .expect(400);

      expect(response.body.message).toBe(
        "output_text is required unless error_message is given",
      );
    });

    it("should refuse changes other than completion", async () => {
      const id = await queuePrediction();

      await request(app.getHttpServer())
        .put(`/predictions/${id}`)
        .send({})
        .expect(501);
    });

    it("should return 404 for an unknown job", async () => {
      await request(app.getHttpServer())
        .put("/predictions/999")
        .send({ output_text: "HELLO" })
        .expect(404);
    });
  });

  describe("GET /predictions", () => {
    it("should list newest first and filter by session", async () => {
      await queuePrediction({ session_id: "s1" });
      await queuePrediction({ session_id: "s2" });
      await queuePrediction({ session_id: "s1" });

      const forSession = await request(app.getHttpServer())
        .get("/predictions")
        .query({ session_id: "s1" })
        .expect(200);

      expect(
        forSession.body.map(
          (prediction: { prediction_id: number }) => prediction.prediction_id,
        ),
      ).toEqual([3, 1]);
    });
  });

  describe("DELETE /predictions/:id", () => {
    it("should delete a job", async () => {
      const id = await queuePrediction();

      await request(app.getHttpServer())
        .delete(`/predictions/${id}`)
        .expect(200)
        .expect({ deleted: true });
      await request(app.getHttpServer())
        .delete(`/predictions/${id}`)
        .expect(404);
    });
  });
});
