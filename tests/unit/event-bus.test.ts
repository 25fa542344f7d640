import { EventBus } from "../../src/press/EventBus";

type Events = {
  change: [value: number];
  reset: [];
};

describe("EventBus", () => {
  it("delivers to subscribers until they unsubscribe", () => {
    const bus = new EventBus<Events>();
    const seen: number[] = [];
    const off = bus.on("change", (v) => seen.push(v));

    bus.emit("change", 1);
    off();
    bus.emit("change", 2);

    expect(seen).toEqual([1]);
  });

  it("keeps notifying other subscribers when one throws", () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    const bus = new EventBus<Events>();
    const after = jest.fn();

    bus.on("reset", () => {
      throw new Error("bad listener");
    });
    bus.on("reset", after);
    bus.emit("reset");

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('[EventBus] error in "reset":');
    errorSpy.mockRestore();
  });

  it("clear removes every subscription", () => {
    const bus = new EventBus<Events>();
    const fn = jest.fn();
    bus.on("change", fn);

    bus.clear();
    bus.emit("change", 3);

    expect(fn).not.toHaveBeenCalled();
  });
});
