import { EditorSelection, EditorState, type TransactionSpec } from "@codemirror/state";
import type { EditorView } from "@codemirror/view";
import {
  agentMentionExtension,
  submitAgentMention,
  type AgentMentionOptions,
  type AgentMentionQuery,
} from "@tandem/editor";
import {
  DocumentContent,
  DocumentId,
  Participant,
  UserColor,
  UserId,
  UserName,
} from "@tandem/shared";
import { describe, expect, it, vi } from "vitest";
import { AgentInvocationService } from "./agent-invocation";
import { SessionCoordinator } from "./session-coordinator";

const ALICE = new UserId("alice");
const TEXT = "Intro\n@j what is TypeScript?\nOutro";

function createView(options: AgentMentionOptions) {
  let state = EditorState.create({
    doc: TEXT,
    extensions: [agentMentionExtension(options)],
    selection: EditorSelection.cursor(28),
  });
  return {
    dispatch: (spec: TransactionSpec) => {
      state = state.update(spec).state;
    },
    get state() {
      return state;
    },
  } as unknown as Pick<EditorView, "state" | "dispatch">;
}

describe("editor mention to session document", () => {
  it("answers at the spot the mention was submitted from", async () => {
    const coordinator = new SessionCoordinator();
    await coordinator.openSession("s1", new DocumentId("d1"), new DocumentContent(TEXT), ALICE);
    await coordinator.join(
      "s1",
      Participant.join(ALICE, new UserName("Alice"), new UserColor("#61afef")),
    );
    const invoke = vi.fn(async () => "A typed superset of JavaScript.");
    const service = new AgentInvocationService({ coordinator, invoker: { invoke } });

    const queries: AgentMentionQuery[] = [];
    const options: AgentMentionOptions = { onQuery: (query) => queries.push(query) };
    const view = createView(options);

    expect(submitAgentMention(view, options)).toBe(true);
    // The editor's deletion reaches the session before the agent answers.
    await coordinator.edit("s1", ALICE, new DocumentContent(view.state.doc.toString()));
    const result = await service.submit({
      detection: queries[0].detection,
      sessionId: "s1",
    });

    expect(invoke).toHaveBeenCalledWith(
      expect.objectContaining({ agentName: null, question: "what is TypeScript?" }),
    );
    expect(result.document.content.value).toBe(
      "Intro\nA typed superset of JavaScript.\nOutro",
    );
    expect(result.document.version).toBe(3);
  });
});
