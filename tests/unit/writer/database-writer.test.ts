import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resetAssociationsConfigurations, setAssociationsConfigurations } from "../../../src/config";
import { RecordInvalidError } from "../../../src/errors";
import type { StrictMode } from "../../../src/types";
import { DatabaseWriter } from "../../../src/writer/database-writer";
import { Post, User } from "../../fixtures/models/test-models";
import type { MemoryDriver } from "../../helpers/memory-driver";
import { setupMemoryDataSource } from "../../helpers/setup-data-source";

class StrippedPost extends Post {
  public static strictMode: StrictMode = "strip";
}

class StrictPost extends Post {
  public static strictMode: StrictMode = "fail";
}

describe("DatabaseWriter", () => {
  let driver: MemoryDriver;

  beforeEach(() => {
    driver = setupMemoryDataSource();
  });

  afterEach(() => {
    resetAssociationsConfigurations();
  });

  describe("insert", () => {
    it("should insert the record and take the generated key", async () => {
      const post = new Post({ title: "Hello" });
      const result = await new DatabaseWriter(post).save();

      expect(result).toEqual({
        success: true,
        document: { title: "Hello", id: 1 },
        isNew: true,
        modifiedCount: undefined,
      });
      expect(post.isNew).toBe(false);
      expect(post.hasChanges()).toBe(false);
      expect(driver.rows("posts")).toEqual([{ title: "Hello", id: 1 }]);
    });

    it("should not open a transaction without related records to save", async () => {
      await Post.create({ title: "Hello" });

      expect(driver.transactions.begun).toBe(0);
    });
  });

  describe("update", () => {
    it("should skip the driver when nothing changed", async () => {
      const post = await Post.create({ title: "Hello" });
      const update = vi.spyOn(driver, "update");

      const result = await new DatabaseWriter(post).save();

      expect(result.modifiedCount).toBe(0);
      expect(update).not.toHaveBeenCalled();
    });

    it("should send set and unset operations for changed columns", async () => {
      const post = await Post.create({ title: "Hello", draft: true });
      const update = vi.spyOn(driver, "update");

      post.set("title", "Hello again");
      post.unset("draft");

      const result = await new DatabaseWriter(post).save();

      expect(update).toHaveBeenCalledWith(
        "posts",
        { id: 1 },
        { $set: { title: "Hello again" }, $unset: { draft: 1 } },
      );
      expect(result.modifiedCount).toBe(1);
      expect(driver.rows("posts")).toEqual([{ title: "Hello again", id: 1 }]);
    });
  });

  describe("validation", () => {
    it("should reject invalid records and keep their errors", async () => {
      const post = new Post({ body: "No title" });

      await expect(post.save()).rejects.toThrow(RecordInvalidError);

      expect(post.isNew).toBe(true);
      expect(post.errors.map((error) => error.input)).toEqual(["title"]);
      expect(driver.rows("posts")).toEqual([]);
    });

    it("should report the outcome to validated listeners", async () => {
      const post = new Post({ body: "No title" });
      const validated = vi.fn();

      post.on("validated", validated);

      await expect(post.save()).rejects.toThrow("[Post Model] Validation failed");

      expect(validated).toHaveBeenCalledWith(post, { isValid: false, errors: post.errors });
    });

    it("should clear previous errors on the next save", async () => {
      const post = new Post({});

      await expect(post.save()).rejects.toThrow(RecordInvalidError);

      post.set("title", "Fixed");
      await post.save();

      expect(post.errors).toEqual([]);
      expect(post.isNew).toBe(false);
    });

    it("should keep attributes the schema does not declare", async () => {
      const post = new Post({ title: "Hello", userId: 7 });

      await post.save();

      expect(driver.rows("posts")).toEqual([{ title: "Hello", userId: 7, id: 1 }]);
    });

    it("should validate updates of records carrying their key", async () => {
      const post = await Post.create({ title: "Hello", userId: 7 });

      post.set("userId", 8);
      await post.save();

      expect(post.errors).toEqual([]);
      expect(driver.rows("posts")).toEqual([{ title: "Hello", userId: 8, id: 1 }]);
    });

    it("should drop undeclared attributes in strip mode", async () => {
      const post = new StrippedPost({ title: "Hello", draft: true });

      await post.save();

      expect(post.has("draft")).toBe(false);
      expect(driver.rows("posts")).toEqual([{ title: "Hello", id: 1 }]);
    });

    it("should reject undeclared attributes in fail mode", async () => {
      const post = new StrictPost({ title: "Hello", draft: true });

      await expect(post.save()).rejects.toThrow(RecordInvalidError);

      expect(post.isNew).toBe(true);
      expect(driver.rows("posts")).toEqual([]);
    });

    it("should fall back to the configured strict mode", async () => {
      setAssociationsConfigurations({ strictMode: "fail" });

      await expect(new Post({ title: "Hello", userId: 7 }).save()).rejects.toThrow(
        RecordInvalidError,
      );

      expect(driver.rows("posts")).toEqual([]);
    });

    it("should save without validating when asked to", async () => {
      const post = new Post({ body: "No title" });

      await post.save({ skipValidation: true });

      expect(driver.rows("posts")).toEqual([{ body: "No title", id: 1 }]);
    });
  });

  describe("autosave", () => {
    it("should save an assigned belongs-to record first and copy its key", async () => {
      const post = new Post({ title: "Hello" });
      const author = new User({ name: "Ann" });

      post.singularAssociation("author").writer(author);
      await post.save();

      expect(author.isNew).toBe(false);
      expect(driver.rows("users")).toEqual([{ name: "Ann", id: 1 }]);
      expect(driver.rows("posts")).toEqual([{ title: "Hello", userId: 1, id: 1 }]);
      expect(driver.transactions).toEqual({ begun: 1, committed: 1, rolledBack: 0 });
    });

    it("should save built members after the owner", async () => {
      const user = new User({ name: "Ann" });
      const post = user.collectionAssociation("posts").build({ title: "Draft" });

      await user.save();

      expect(post.isNew).toBe(false);
      expect(driver.rows("users")).toEqual([{ name: "Ann", id: 1 }]);
      expect(driver.rows("posts")).toEqual([{ title: "Draft", userId: 1, id: 1 }]);
    });

    it("should save new members built on a saved owner", async () => {
      const user = await User.create({ name: "Ann" });

      user.collectionAssociation("posts").build({ title: "Draft" });
      await user.save();

      expect(driver.rows("posts")).toEqual([{ title: "Draft", userId: 1, id: 1 }]);
    });

    it("should roll back the owner when a member fails validation", async () => {
      const user = new User({ name: "Ann" });
      user.collectionAssociation("posts").build({ body: "No title" });

      await expect(user.save()).rejects.toThrow(RecordInvalidError);

      expect(user.isNew).toBe(true);
      expect(user.get("id")).toBeUndefined();
      expect(driver.rows("users")).toEqual([]);
      expect(driver.transactions.rolledBack).toBe(1);
    });

    it("should leave related records alone when autosave is skipped", async () => {
      const user = new User({ name: "Ann" });
      const post = user.collectionAssociation("posts").build({ title: "Draft" });

      await user.save({ skipAutosave: true });

      expect(post.isNew).toBe(true);
      expect(driver.rows("posts")).toEqual([]);
    });
  });
});
