import { beforeEach, describe, expect, it } from "vitest";
import { ConflictError, NotFoundError, ValidationError } from "../../utils/errors";
import { createTestStore, seedRunning, TestStore } from "../../__tests__/helpers/testDb";

describe("UserService", () => {
  let store: TestStore;

  beforeEach(async () => {
    store = await createTestStore();
  });

  it("round-trips a created user with a fresh id", async () => {
    const { users } = store.services;
    const created = await users.createUser({
      username: "john_doe",
      email: "john@example.com",
      age: 28,
      heightCm: 175,
    });

    const read = await users.getUser(created.id);

    expect(read.id).toBeGreaterThan(0);
    expect(read).toMatchObject({
      id: created.id,
      username: "john_doe",
      email: "john@example.com",
      age: 28,
      heightCm: 175,
    });
    expect(read.createdAt).toBeInstanceOf(Date);
  });

  it("stores optional profile fields as null", async () => {
    const user = await store.services.users.createUser({
      username: "jane_smith",
      email: "jane@example.com",
    });

    expect(user.age).toBeNull();
    expect(user.heightCm).toBeNull();
  });

  it("lower-cases and trims email addresses", async () => {
    const user = await store.services.users.createUser({
      username: "mike_johnson",
      email: "  Mike@Example.com ",
    });

    expect(user.email).toBe("mike@example.com");
  });

  it("rejects a duplicate username", async () => {
    const { users } = store.services;
    await users.createUser({ username: "john_doe", email: "john@example.com" });

    await expect(
      users.createUser({ username: "john_doe", email: "other@example.com" })
    ).rejects.toThrow(ConflictError);
  });

  it("rejects a duplicate email", async () => {
    const { users } = store.services;
    await users.createUser({ username: "john_doe", email: "john@example.com" });

    await expect(
      users.createUser({ username: "johnny", email: "john@example.com" })
    ).rejects.toThrow('Email "john@example.com" is already registered');
  });

  it("rejects malformed input", async () => {
    const { users } = store.services;

    await expect(users.createUser({ username: "", email: "a@example.com" })).rejects.toThrow(
      ValidationError
    );
    await expect(users.createUser({ username: "x", email: "not-an-email" })).rejects.toThrow(
      "email must be a valid email address"
    );
    await expect(
      users.createUser({ username: "x", email: "x@example.com", age: -1 })
    ).rejects.toThrow("age must not be negative");
  });

  it("lists users in id order", async () => {
    const { users } = store.services;
    await users.createUser({ username: "b_user", email: "b@example.com" });
    await users.createUser({ username: "a_user", email: "a@example.com" });

    const list = await users.listUsers();

    expect(list.map((u) => u.username)).toEqual(["b_user", "a_user"]);
  });

  it("edits profile fields and keeps created_at", async () => {
    const { users } = store.services;
    const created = await users.createUser({ username: "john_doe", email: "john@example.com" });

    const updated = await users.updateUser(created.id, { age: 29, heightCm: 176 });

    expect(updated.age).toBe(29);
    expect(updated.heightCm).toBe(176);
    expect(updated.username).toBe("john_doe");
    expect(updated.createdAt).toEqual(created.createdAt);
  });

  it("allows re-saving a user's own username but not another's", async () => {
    const { users } = store.services;
    const john = await users.createUser({ username: "john_doe", email: "john@example.com" });
    await users.createUser({ username: "jane_smith", email: "jane@example.com" });

    await expect(users.updateUser(john.id, { username: "john_doe" })).resolves.toMatchObject({
      username: "john_doe",
    });
    await expect(users.updateUser(john.id, { username: "jane_smith" })).rejects.toThrow(
      ConflictError
    );
  });

  it("requires at least one field to update", async () => {
    const { users } = store.services;
    const john = await users.createUser({ username: "john_doe", email: "john@example.com" });

    await expect(users.updateUser(john.id, {})).rejects.toThrow(
      "at least one field must be provided"
    );
  });

  it("fails with NotFoundError for unknown users", async () => {
    const { users } = store.services;

    await expect(users.getUser(999)).rejects.toThrow(NotFoundError);
    await expect(users.updateUser(999, { age: 30 })).rejects.toThrow("User 999 not found");
    await expect(users.deleteUser(999)).rejects.toThrow(NotFoundError);
  });

  describe("deleteUser", () => {
    it("deletes a user without dependents", async () => {
      const { users } = store.services;
      const user = await users.createUser({ username: "john_doe", email: "john@example.com" });

      await users.deleteUser(user.id);

      await expect(users.getUser(user.id)).rejects.toThrow(NotFoundError);
    });

    it("refuses while dependents exist unless cascading", async () => {
      const { users, weights } = store.services;
      const user = await users.createUser({ username: "john_doe", email: "john@example.com" });
      await weights.recordWeight(user.id, { weightKg: 75.2, recordedDate: "2024-08-01" });

      await expect(users.deleteUser(user.id)).rejects.toThrow(ConflictError);
      await expect(users.getUser(user.id)).resolves.toMatchObject({ id: user.id });
    });

    it("removes weight records, sessions and goals when cascading", async () => {
      const { services } = store;
      const { user, running } = await seedRunning(services);
      await services.weights.recordWeight(user.id, { weightKg: 75.2, recordedDate: "2024-08-01" });
      await services.workouts.logWorkout(user.id, {
        exerciseTypeId: running.id,
        durationMinutes: 30,
        workoutDate: "2024-08-20",
      });
      await services.goals.setGoal(user.id, { goalType: "weight_loss", targetValue: 72 });

      await services.users.deleteUser(user.id, { cascade: true });

      await expect(services.users.getUser(user.id)).rejects.toThrow(NotFoundError);
      for (const table of ["weight_records", "workout_sessions", "goals"]) {
        const { rows } = await store.pool.query(`SELECT COUNT(*) as "count" FROM ${table}`);
        expect(Number(rows[0].count)).toBe(0);
      }
      // the shared catalog is untouched
      await expect(services.exerciseTypes.getExerciseType(running.id)).resolves.toMatchObject({
        name: "Running",
      });
    });
  });
});
