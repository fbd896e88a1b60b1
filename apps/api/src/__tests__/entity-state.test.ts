import { describe, it, expect } from "vitest";
import { EntityState } from "../models/entity-state.js";

describe("EntityState", () => {
  it("starts active, disabled and without metadata", () => {
    const state = new EntityState();

    expect(state.active).toBe(true);
    expect(state.enabled).toBe(false);
    expect(state.metadata).toEqual({});
  });

  it("toggles enablement and activity", () => {
    const state = new EntityState();

    state.enable();
    state.deactivate();
    expect(state.enabled).toBe(true);
    expect(state.active).toBe(false);

    state.disable();
    state.activate();
    expect(state.enabled).toBe(false);
    expect(state.active).toBe(true);
  });

  it("adds metadata without overwriting", () => {
    const state = new EntityState();

    expect(state.addMetadata("owner", "noc")).toBe(true);
    expect(state.addMetadata("owner", "ops")).toBe(false);
    expect(state.getMetadata("owner")).toBe("noc");

    state.updateMetadata("owner", "ops");
    expect(state.getMetadata("owner")).toBe("ops");
  });

  it("extends metadata, replacing existing keys only when forced", () => {
    const state = new EntityState();
    state.addMetadata("owner", "noc");

    state.extendMetadata({ owner: "ops", site: "lab" }, false);
    expect(state.metadata).toEqual({ owner: "noc", site: "lab" });

    state.extendMetadata({ owner: "ops" });
    expect(state.metadata).toEqual({ owner: "ops", site: "lab" });
  });

  it("removes and clears metadata", () => {
    const state = new EntityState();
    state.extendMetadata({ owner: "noc", site: "lab" });

    expect(state.removeMetadata("owner")).toBe(true);
    expect(state.removeMetadata("owner")).toBe(false);
    expect(state.metadata).toEqual({ site: "lab" });

    state.clearMetadata();
    expect(state.metadata).toEqual({});
  });

  it("treats object prototype names as ordinary keys", () => {
    const state = new EntityState();

    expect(state.getMetadata("constructor")).toBeUndefined();
    expect(state.removeMetadata("constructor")).toBe(false);
    expect(state.addMetadata("toString", "x")).toBe(true);
    expect(state.getMetadata("toString")).toBe("x");
    expect(state.metadata).toEqual({ toString: "x" });
  });

  it("hands out a copy of the metadata", () => {
    const state = new EntityState();
    const snapshot = state.metadata;
    snapshot.owner = "noc";

    expect(state.getMetadata("owner")).toBeUndefined();
  });
});
