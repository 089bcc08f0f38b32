import request from "supertest";
import { Express } from "express";
import { createApp } from "../app";
import { createServices } from "../services";
import { KeyValueStore } from "../services/store";
import { MemoryStore, UnreachableStore } from "./memoryStore";

const ADMIN_ID = 1000;
const USER_HEADER = "X-User-Id";

function buildApp(store: KeyValueStore = new MemoryStore()): Express {
  return createApp(
    createServices(store, {
      adminIds: new Set([ADMIN_ID]),
      referralBonus: 50,
    }),
  );
}

const mango = {
  name: "Mango Liquid",
  category: "liquids",
  price: 450,
  stock: 10,
  description: "Sweet mango",
  emoji: "🥭",
};

describe("Shop API", () => {
  let app: Express;

  beforeEach(() => {
    app = buildApp();
  });

  describe("Health", () => {
    test("reports healthy and ready", async () => {
      const health = await request(app).get("/health").expect(200);
      expect(health.body).toEqual({
        status: "healthy",
        service: "vape-shop-api",
      });

      const ready = await request(app).get("/ready").expect(200);
      expect(ready.body.store).toBe("connected");
    });
  });

  describe("Caller identification", () => {
    test("rejects a malformed user id header", async () => {
      const res = await request(app)
        .get("/api/products")
        .set(USER_HEADER, "abc")
        .expect(400);
      expect(res.body.error).toBe("Invalid X-User-Id header");
    });

    test("admin routes need a caller and the allow-list", async () => {
      await request(app).post("/api/products").send(mango).expect(401);

      const res = await request(app)
        .post("/api/products")
        .set(USER_HEADER, "5")
        .send(mango)
        .expect(403);
      expect(res.body.error).toBe("Forbidden: Admin access required");
    });
  });

  describe("Products", () => {
    test("admin creates, updates and deletes a product", async () => {
      const created = await request(app)
        .post("/api/products")
        .set(USER_HEADER, String(ADMIN_ID))
        .send(mango)
        .expect(201);
      expect(created.body.success).toBe(true);
      expect(created.body.product).toMatchObject({ id: 1, ...mango });

      const updated = await request(app)
        .put("/api/products/1")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ price: 999 })
        .expect(200);
      expect(updated.body.product.price).toBe(999);
      expect(updated.body.product.name).toBe("Mango Liquid");
      expect(updated.body.product.created_at).toBe(
        created.body.product.created_at,
      );

      const list = await request(app).get("/api/products").expect(200);
      expect(list.body).toHaveLength(1);

      await request(app)
        .delete("/api/products/1")
        .set(USER_HEADER, String(ADMIN_ID))
        .expect(200);
      await request(app)
        .delete("/api/products/1")
        .set(USER_HEADER, String(ADMIN_ID))
        .expect(404);
      await request(app).get("/api/products/1").expect(404);
    });

    test("creation requires name, category, price and stock", async () => {
      const res = await request(app)
        .post("/api/products")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ name: "No price" })
        .expect(400);

      const fields = res.body.errors.map((e: { path: string }) => e.path);
      expect(fields).toEqual(
        expect.arrayContaining(["category", "price", "stock"]),
      );
    });

    test("updating an unknown product is a 404, not a create", async () => {
      await request(app)
        .put("/api/products/50")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ price: 10 })
        .expect(404);

      const list = await request(app).get("/api/products").expect(200);
      expect(list.body).toEqual([]);
    });
  });

  describe("Orders", () => {
    const order = {
      items: [{ productId: 1, quantity: 2, price: 450 }],
      total: 900,
    };

    test("checkout defaults to the caller and pending status", async () => {
      const res = await request(app)
        .post("/api/orders")
        .set(USER_HEADER, "5")
        .send(order)
        .expect(201);

      expect(res.body.order).toMatchObject({
        id: 1,
        userId: 5,
        total: 900,
        status: "pending",
        items: order.items,
      });
    });

    test("cannot order on behalf of another user", async () => {
      await request(app)
        .post("/api/orders")
        .set(USER_HEADER, "5")
        .send({ ...order, userId: 6 })
        .expect(403);
    });

    test("rejects an order without items", async () => {
      await request(app)
        .post("/api/orders")
        .set(USER_HEADER, "5")
        .send({ items: [], total: 0 })
        .expect(400);
    });

    test("owners and admins see a user's orders", async () => {
      await request(app).post("/api/orders").set(USER_HEADER, "5").send(order);
      await request(app).post("/api/orders").set(USER_HEADER, "6").send(order);
      await request(app).post("/api/orders").set(USER_HEADER, "5").send(order);

      const mine = await request(app)
        .get("/api/orders/user/5")
        .set(USER_HEADER, "5")
        .expect(200);
      expect(mine.body.map((o: { id: number }) => o.id)).toEqual([3, 1]);

      await request(app)
        .get("/api/orders/user/5")
        .set(USER_HEADER, "6")
        .expect(403);

      const asAdmin = await request(app)
        .get("/api/orders/user/5")
        .set(USER_HEADER, String(ADMIN_ID))
        .expect(200);
      expect(asAdmin.body).toHaveLength(2);
    });

    test("completing orders feeds revenue statistics", async () => {
      await request(app).post("/api/orders").set(USER_HEADER, "5").send(order);
      await request(app)
        .post("/api/orders")
        .set(USER_HEADER, "6")
        .send({ ...order, total: 300 });

      await request(app)
        .patch("/api/orders/1/status")
        .set(USER_HEADER, "6")
        .send({ status: "completed" })
        .expect(403);
      await request(app)
        .patch("/api/orders/1/status")
        .set(USER_HEADER, "5")
        .send({ status: "completed" })
        .expect(200);
      await request(app)
        .patch("/api/orders/9/status")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ status: "completed" })
        .expect(404);

      await request(app).get("/api/stats").set(USER_HEADER, "5").expect(403);
      const stats = await request(app)
        .get("/api/stats")
        .set(USER_HEADER, String(ADMIN_ID))
        .expect(200);
      expect(stats.body).toMatchObject({
        total_orders: 2,
        total_revenue: 900,
      });
    });
  });

  describe("Users", () => {
    test("first read creates the profile", async () => {
      const res = await request(app)
        .get("/api/users/42")
        .query({ username: "mila" })
        .set(USER_HEADER, "42")
        .expect(200);

      expect(res.body).toMatchObject({
        id: 42,
        username: "mila",
        bonus: 0,
        referrals: [],
        referralCode: "REF42",
        referredBy: null,
        isAdmin: false,
      });

      const again = await request(app)
        .get("/api/users/42")
        .set(USER_HEADER, "42")
        .expect(200);
      expect(again.body).toEqual(res.body);
    });

    test("profiles are private to their owner", async () => {
      await request(app).get("/api/users/42").set(USER_HEADER, "43").expect(403);
    });

    test("only admins change bonus", async () => {
      await request(app)
        .put("/api/users/42")
        .set(USER_HEADER, "42")
        .send({ bonus: 500 })
        .expect(403);

      const res = await request(app)
        .put("/api/users/42")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ bonus: 500 })
        .expect(200);
      expect(res.body.user.bonus).toBe(500);
    });

    test("redeeming a referral code credits the referrer", async () => {
      await request(app).get("/api/users/10").set(USER_HEADER, "10");

      const res = await request(app)
        .post("/api/users/20/referral")
        .set(USER_HEADER, "20")
        .send({ code: "REF10" })
        .expect(200);
      expect(res.body).toEqual({ success: true, referrerId: 10 });

      const again = await request(app)
        .post("/api/users/20/referral")
        .set(USER_HEADER, "20")
        .send({ code: "REF10" })
        .expect(409);
      expect(again.body).toEqual({
        error: "Referral already applied",
        code: "conflict",
      });

      const referrer = await request(app)
        .get("/api/users/10")
        .set(USER_HEADER, "10")
        .expect(200);
      expect(referrer.body.bonus).toBe(50);
      expect(referrer.body.referrals).toEqual([20]);
    });
  });

  describe("Promos", () => {
    test("admin creates codes, duplicates conflict", async () => {
      await request(app)
        .post("/api/promos")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ code: "VAPE10", discount: 10, uses: 1 })
        .expect(201);

      const dup = await request(app)
        .post("/api/promos")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ code: "VAPE10", discount: 10, uses: 1 })
        .expect(409);
      expect(dup.body.code).toBe("conflict");

      const list = await request(app)
        .get("/api/promos")
        .set(USER_HEADER, String(ADMIN_ID))
        .expect(200);
      expect(list.body).toHaveLength(1);
    });

    test("a single-use code redeems once", async () => {
      await request(app)
        .post("/api/promos")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ code: "ONCE", discount: 15, uses: 1 });

      const first = await request(app)
        .post("/api/promos/apply")
        .set(USER_HEADER, "5")
        .send({ code: "ONCE" })
        .expect(200);
      expect(first.body).toEqual({ success: true, discount: 15, used: 1 });

      const second = await request(app)
        .post("/api/promos/apply")
        .set(USER_HEADER, "5")
        .send({ code: "ONCE" })
        .expect(400);
      expect(second.body.code).toBe("limit_reached");

      await request(app)
        .post("/api/promos/apply")
        .set(USER_HEADER, "5")
        .send({ code: "MISSING" })
        .expect(404);
    });

    test("discount must be a percentage", async () => {
      await request(app)
        .post("/api/promos")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ code: "BIG", discount: 150, uses: 1 })
        .expect(400);
    });
  });

  describe("Broadcast", () => {
    test("admin broadcast reaches every known user", async () => {
      await request(app).get("/api/users/1").set(USER_HEADER, "1");
      await request(app).get("/api/users/2").set(USER_HEADER, "2");

      const res = await request(app)
        .post("/api/admin/broadcast")
        .set(USER_HEADER, String(ADMIN_ID))
        .send({ message: "New flavours in stock" })
        .expect(200);
      expect(res.body).toEqual({ success: true, recipients: 2 });

      await request(app)
        .post("/api/admin/broadcast")
        .set(USER_HEADER, "1")
        .send({ message: "hi" })
        .expect(403);
    });
  });

  describe("Store failures", () => {
    test("surface as internal errors", async () => {
      const broken = buildApp(new UnreachableStore());

      const res = await request(broken).get("/api/products").expect(500);
      expect(res.body).toEqual({ error: "Failed to list products" });

      const ready = await request(broken).get("/ready").expect(503);
      expect(ready.body.status).toBe("degraded");
    });
  });
});
