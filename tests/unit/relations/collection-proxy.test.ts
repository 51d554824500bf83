import { beforeEach, describe, expect, it } from "vitest";
import { CollectionProxy } from "../../../src/relations/collection-proxy";
import { Post, User } from "../../fixtures/models/test-models";
import type { MemoryDriver } from "../../helpers/memory-driver";
import { setupMemoryDataSource } from "../../helpers/setup-data-source";

describe("CollectionProxy", () => {
  let driver: MemoryDriver;
  let user: User;

  beforeEach(async () => {
    driver = setupMemoryDataSource();
    user = await User.create({ name: "Ann" });
    driver.seed("posts", [
      { title: "a", userId: 1 },
      { title: "b", userId: 1 },
    ]);
  });

  it("should be returned for collection relationships", async () => {
    expect(await user.related("posts")).toBeInstanceOf(CollectionProxy);
  });

  it("should load lazily on first read", async () => {
    const proxy = await user.collectionAssociation("posts").reader();

    expect(proxy.isLoaded()).toBe(false);
    expect(proxy.length).toBe(0);

    const first = await proxy.first();

    expect(first?.get("title")).toBe("a");
    expect(proxy.length).toBe(2);
    expect(driver.queries).toEqual(["posts"]);
  });

  it("should return a copy of the members", async () => {
    const proxy = await user.collectionAssociation("posts").reader();
    const members = await proxy.toArray();

    members.pop();

    expect(await proxy.size()).toBe(2);
  });

  it("should resolve to itself after adding records", async () => {
    const proxy = await user.collectionAssociation("posts").reader();

    expect(await proxy.push(new Post({ title: "c" }))).toBe(proxy);
    expect(await proxy.concat(new Post({}))).toBe(false);
  });

  it("should build and create through the association", async () => {
    const proxy = await user.collectionAssociation("posts").reader();

    const draft = proxy.build({ title: "draft" });
    const created = await proxy.create({ title: "c" });

    expect(draft.isNew).toBe(true);
    expect(created.get("userId")).toBe(1);
    expect(await proxy.includes(draft)).toBe(true);
    expect(await proxy.includes(created)).toBe(true);
  });

  it("should forget members on reset and fetch them again on reload", async () => {
    const proxy = await user.collectionAssociation("posts").reader();

    await proxy.toArray();
    proxy.reset();

    expect(proxy.isLoaded()).toBe(false);
    expect(proxy.length).toBe(0);

    await proxy.reload();

    expect(proxy.length).toBe(2);
    expect(driver.queries).toEqual(["posts", "posts"]);
  });

  it("should delegate ids, emptiness and selection", async () => {
    const proxy = await user.collectionAssociation("posts").reader();

    expect(await proxy.ids()).toEqual([1, 2]);
    expect(await proxy.isEmpty()).toBe(false);
    expect(await proxy.any()).toBe(true);
    expect(await proxy.many()).toBe(true);

    const picked = await proxy.select((post) => post.get("title") === "b");

    expect(picked.map((post) => post.id)).toEqual([2]);

    await proxy.setIds([2]);

    expect(await proxy.ids()).toEqual([2]);
    expect(await proxy.replace([])).toBe(true);
    expect(proxy.length).toBe(0);
  });
});
