import { describe, expect, it } from "vitest";
import { invokeOnObject } from "./dynamic";

class Counter {
  public value = 0;

  public add(amount: number): void {
    this.value += amount;
  }

  public double(): void {
    this.value *= 2;
  }
}

describe("invokeOnObject", () => {
  it("should apply invocations in order", () => {
    const counter = invokeOnObject(new Counter(), [["add", 3], ["double"]]);

    expect(counter.value).toBe(6);
  });

  it("should return given instance", () => {
    const counter = new Counter();

    expect(invokeOnObject(counter, [])).toBe(counter);
  });
});
