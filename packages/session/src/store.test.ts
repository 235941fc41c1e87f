import {
  CollaborationSession,
  Document,
  DocumentContent,
  DocumentId,
  UserId,
} from "@tandem/shared";
import { describe, expect, it, vi } from "vitest";
import { createSessionRegistryStore } from "./store";

const DOC_ID = new DocumentId("d1");

describe("session registry store", () => {
  it("puts and removes sessions", () => {
    const store = createSessionRegistryStore();
    const session = CollaborationSession.create("s1", DOC_ID);

    store.getState().putSession(session);
    expect(store.getState().sessions.get("s1")).toBe(session);

    store.getState().removeSession("s1");
    expect(store.getState().sessions.size).toBe(0);
  });

  it("keys documents by id", () => {
    const store = createSessionRegistryStore();
    const document = Document.create(DOC_ID, DocumentContent.empty(), new UserId("u-1"));

    store.getState().putDocument(document);
    expect([...store.getState().documents.keys()]).toEqual(["d1"]);

    store.getState().removeDocument("d1");
    expect(store.getState().documents.size).toBe(0);
  });

  it("finds nothing under ids named like object members", () => {
    const store = createSessionRegistryStore();

    expect(store.getState().sessions.get("constructor")).toBeUndefined();
    expect(store.getState().documents.get("toString")).toBeUndefined();
  });

  it("replaces the maps instead of mutating them", () => {
    const store = createSessionRegistryStore();
    const before = store.getState().sessions;

    store.getState().putSession(CollaborationSession.create("s1", DOC_ID));

    expect(before.size).toBe(0);
    expect(store.getState().sessions).not.toBe(before);
  });

  it("notifies subscribers", () => {
    const store = createSessionRegistryStore();
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.getState().putSession(CollaborationSession.create("s1", DOC_ID));
    unsubscribe();
    store.getState().reset();

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
