import { describe, expect, it } from "vitest";
import { DataSource } from "../../../src/data-source/data-source";
import { MemoryDriver } from "../../helpers/memory-driver";

describe("DataSource", () => {
  it("should default isDefault to false", () => {
    const dataSource = new DataSource({ name: "primary", driver: new MemoryDriver() });

    expect(dataSource.isDefault).toBe(false);
    expect(dataSource.inTransaction).toBe(false);
  });

  describe("transaction()", () => {
    it("should commit and return the callback result", async () => {
      const driver = new MemoryDriver();
      const dataSource = new DataSource({ name: "primary", driver });

      const result = await dataSource.transaction(async () => {
        expect(dataSource.inTransaction).toBe(true);
        await driver.insert("users", { name: "Alice" });
        return "done";
      });

      expect(result).toBe("done");
      expect(dataSource.inTransaction).toBe(false);
      expect(driver.transactions).toEqual({ begun: 1, committed: 1, rolledBack: 0 });
      expect(driver.rows("users")).toEqual([{ name: "Alice", id: 1 }]);
    });

    it("should roll back and rethrow when the callback throws", async () => {
      const driver = new MemoryDriver();
      const dataSource = new DataSource({ name: "primary", driver });

      await expect(
        dataSource.transaction(async () => {
          await driver.insert("users", { name: "Alice" });
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");

      expect(driver.transactions).toEqual({ begun: 1, committed: 0, rolledBack: 1 });
      expect(driver.rows("users")).toEqual([]);
      expect(dataSource.inTransaction).toBe(false);
    });

    it("should join an open transaction instead of nesting", async () => {
      const driver = new MemoryDriver();
      const dataSource = new DataSource({ name: "primary", driver });

      await dataSource.transaction(async () => {
        await dataSource.transaction(async () => {
          await driver.insert("users", { name: "Alice" });
        });
      });

      expect(driver.transactions).toEqual({ begun: 1, committed: 1, rolledBack: 0 });
    });

    it("should open a separate transaction for an unrelated concurrent caller", async () => {
      const driver = new MemoryDriver();
      const dataSource = new DataSource({ name: "primary", driver });
      let release = () => {};
      const gate = new Promise<void>((resolve) => {
        release = () => resolve();
      });

      const first = dataSource.transaction(async () => {
        await gate;
        return dataSource.inTransaction;
      });

      const second = await dataSource.transaction(async () => dataSource.inTransaction);

      expect(dataSource.inTransaction).toBe(false);

      release();

      expect(second).toBe(true);
      expect(await first).toBe(true);
      expect(driver.transactions).toEqual({ begun: 2, committed: 2, rolledBack: 0 });
    });
  });
});
