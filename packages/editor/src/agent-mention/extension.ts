import {
  Facet,
  Prec,
  StateField,
  type EditorState,
  type Extension,
} from "@codemirror/state";
import {
  Decoration,
  type DecorationSet,
  EditorView,
  keymap,
} from "@codemirror/view";
import {
  detectAtCursor,
  extractQuestion,
  isValidForQuery,
  MentionPattern,
  parseAgentCommand,
  type MentionDetection,
} from "@tandem/shared";

/** What the editor hands to the agent collaborator when a mention is submitted. */
export interface AgentMentionQuery {
  readonly question: string;
  readonly agentName: string | null;
  readonly from: number;
  readonly to: number;
  /** The removed command, in document positions; what the session side lands against. */
  readonly detection: MentionDetection;
}

export interface AgentMentionOptions {
  readonly pattern?: MentionPattern;
  readonly knownAgents?: readonly string[];
  readonly onQuery: (query: AgentMentionQuery) => void;
}

interface AgentMentionFieldState {
  /** Detection in absolute document positions. */
  readonly detection: MentionDetection | null;
  readonly ready: boolean;
  readonly decorations: DecorationSet;
}

export const mentionPatternFacet = Facet.define<MentionPattern, MentionPattern>({
  combine: (values) => values[0] ?? MentionPattern.default(),
});

const EMPTY_STATE: AgentMentionFieldState = {
  decorations: Decoration.none,
  detection: null,
  ready: false,
};

function computeMentionState(state: EditorState): AgentMentionFieldState {
  const pattern = state.facet(mentionPatternFacet);
  const head = state.selection.main.head;
  const line = state.doc.lineAt(head);
  const local = detectAtCursor(pattern, line.text, head - line.from);
  if (!local) {
    return EMPTY_STATE;
  }

  const detection: MentionDetection = {
    from: line.from + local.from,
    text: local.text,
    to: line.from + local.to,
  };
  const ready = isValidForQuery(pattern, detection);

  return {
    decorations: Decoration.set([
      Decoration.mark({
        class: ready
          ? "cm-agentMention cm-agentMention-ready"
          : "cm-agentMention",
      }).range(detection.from, detection.to),
    ]),
    detection,
    ready,
  };
}

export const agentMentionState = StateField.define<AgentMentionFieldState>({
  create: computeMentionState,
  provide: (field) =>
    EditorView.decorations.from(field, (value) => value.decorations),
  update(current, transaction) {
    if (!transaction.docChanged && !transaction.selection) {
      return current;
    }
    return computeMentionState(transaction.state);
  },
});

/** The mention under the main cursor, if any. */
export function activeAgentMention(state: EditorState): MentionDetection | null {
  return state.field(agentMentionState, false)?.detection ?? null;
}

/**
 * Submits the mention under the cursor: removes the command text and reports
 * the question. Returns false, leaving the document alone, when there is no
 * mention or its question is empty.
 */
export function submitAgentMention(
  view: Pick<EditorView, "state" | "dispatch">,
  options: AgentMentionOptions,
): boolean {
  const mention = view.state.field(agentMentionState, false);
  if (!mention?.detection || !mention.ready) {
    return false;
  }

  const detection = mention.detection;
  const pattern = view.state.facet(mentionPatternFacet);
  const question = extractQuestion(pattern, detection);
  const command =
    question === null ? null : parseAgentCommand(question, options.knownAgents);
  if (!command) {
    return false;
  }

  const { from, to } = detection;
  view.dispatch({
    changes: { from, insert: "", to },
    selection: { anchor: from },
    userEvent: "delete.agentMention",
  });
  options.onQuery({ ...command, detection, from, to });
  return true;
}

const agentMentionTheme = EditorView.baseTheme({
  ".cm-agentMention": {
    borderRadius: "2px",
    backgroundColor: "rgba(97, 175, 239, 0.16)",
  },
  ".cm-agentMention-ready": {
    backgroundColor: "rgba(97, 175, 239, 0.32)",
  },
});

export function agentMentionExtension(options: AgentMentionOptions): Extension {
  return [
    mentionPatternFacet.of(options.pattern ?? MentionPattern.default()),
    agentMentionState,
    agentMentionTheme,
    Prec.high(
      keymap.of([
        {
          key: "Enter",
          run: (view) => submitAgentMention(view, options),
        },
      ]),
    ),
  ];
}
