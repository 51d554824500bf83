import { beforeEach, describe, expect, it, vi } from "vitest";
import { MongoDbDriver } from "../../../../src/drivers/mongodb/mongodb-driver";
import { buildMongoFilter } from "../../../../src/drivers/mongodb/mongodb-query-builder";

describe("buildMongoFilter", () => {
  it("should return an empty filter without clauses", () => {
    expect(buildMongoFilter([])).toEqual({});
  });

  it("should use equality directly and operators otherwise", () => {
    expect(buildMongoFilter([{ field: "userId", operator: "=", value: 1 }])).toEqual({
      userId: 1,
    });
    expect(buildMongoFilter([{ field: "age", operator: ">=", value: 18 }])).toEqual({
      age: { $gte: 18 },
    });
  });

  it("should join several clauses with $and", () => {
    expect(
      buildMongoFilter([
        { field: "userId", operator: "=", value: 1 },
        { field: "id", operator: "in", value: [3, 4] },
        { field: "status", operator: "!=", value: "draft" },
        { field: "id", operator: "notIn", value: [9] },
      ]),
    ).toEqual({
      $and: [
        { userId: 1 },
        { id: { $in: [3, 4] } },
        { status: { $ne: "draft" } },
        { id: { $nin: [9] } },
      ],
    });
  });
});

describe("MongoQueryBuilder", () => {
  let driver: MongoDbDriver;

  beforeEach(() => {
    driver = new MongoDbDriver({ database: "test" });
  });

  it("should compile the state into a pipeline in stage order", () => {
    const pipeline = driver
      .queryBuilder("posts")
      .select(["id", "title"])
      .limit(5)
      .orderBy("id", "desc")
      .orderBy("title")
      .where("userId", 1)
      .buildPipeline();

    expect(pipeline).toEqual([
      { $match: { userId: 1 } },
      { $sort: { id: -1, title: 1 } },
      { $limit: 5 },
      { $project: { _id: 0, id: 1, title: 1 } },
    ]);
  });

  it("should parse object and operator where forms", () => {
    const query = driver
      .queryBuilder("posts")
      .where({ userId: 1, status: "live" })
      .where("views", ">", 10)
      .whereIn("id", [1, 2]);

    expect(query.wheres).toEqual([
      { field: "userId", operator: "=", value: 1 },
      { field: "status", operator: "=", value: "live" },
      { field: "views", operator: ">", value: 10 },
      { field: "id", operator: "in", value: [1, 2] },
    ]);
  });

  it("should compare against an operator-like value given two arguments", () => {
    const query = driver.queryBuilder("posts").where("symbol", ">");

    expect(query.wheres).toEqual([{ field: "symbol", operator: "=", value: ">" }]);
  });

  it("should hydrate fetched documents with a new builder", async () => {
    const aggregate = vi
      .spyOn(driver, "aggregate")
      .mockResolvedValue([{ id: 1, title: "a" }, { id: 2, title: "b" }]);

    const base = driver.queryBuilder("posts").where("userId", 1);
    const titles = await base.hydrate((data) => String(data.title)).get();

    expect(titles).toEqual(["a", "b"]);
    expect(aggregate).toHaveBeenCalledWith("posts", [{ $match: { userId: 1 } }]);
  });

  it("should limit first and exists to one document", async () => {
    const aggregate = vi.spyOn(driver, "aggregate").mockResolvedValue([]);

    const query = driver.queryBuilder("posts").where("id", 7);

    expect(await query.first()).toBeNull();
    expect(await query.exists()).toBe(false);
    expect(aggregate).toHaveBeenNthCalledWith(1, "posts", [
      { $match: { id: 7 } },
      { $limit: 1 },
    ]);
  });

  it("should count through a $count stage", async () => {
    const aggregate = vi.spyOn(driver, "aggregate").mockResolvedValue([{ total: 3 }]);

    expect(await driver.queryBuilder("posts").count()).toBe(3);
    expect(aggregate).toHaveBeenCalledWith("posts", [{ $count: "total" }]);
  });

  it("should count zero without a result document", async () => {
    vi.spyOn(driver, "aggregate").mockResolvedValue([]);

    expect(await driver.queryBuilder("posts").count()).toBe(0);
  });

  it("should pluck a single field", async () => {
    const aggregate = vi
      .spyOn(driver, "aggregate")
      .mockResolvedValue([{ value: 1 }, {}, { value: 3 }]);

    expect(await driver.queryBuilder("posts").where("userId", 1).pluck("id")).toEqual([1, 3]);
    expect(aggregate).toHaveBeenCalledWith("posts", [
      { $match: { userId: 1 } },
      { $project: { _id: 0, value: "$id" } },
    ]);
  });
});

describe("MongoDbDriver", () => {
  it("should refuse operations before connecting", async () => {
    const driver = new MongoDbDriver({ database: "test" });

    expect(driver.isConnected).toBe(false);
    await expect(driver.delete("posts", { id: 1 })).rejects.toThrow(
      "Database not available. Ensure the driver is connected before accessing the database.",
    );
    await expect(driver.beginTransaction()).rejects.toThrow("Mongo driver is not connected.");
  });
});
