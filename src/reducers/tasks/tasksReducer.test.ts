import { describe, it, expect } from "vitest";
import { tasksReducer, initialState, isBlank } from ".";
import type { State } from ".";

function withTasks(...texts: string[]): State {
  return texts.reduce(
    (s, text, i) => tasksReducer(s, { type: "add-task", id: `t${i + 1}`, text }),
    initialState
  );
}

describe("tasksReducer", () => {
  it("appends trimmed tasks as not completed", () => {
    const s1 = tasksReducer(initialState, {
      type: "add-task",
      id: "t1",
      text: "  Buy milk  ",
    });
    expect(s1.tasks).toEqual([{ id: "t1", text: "Buy milk", completed: false }]);
  });

  it("ignores blank text", () => {
    for (const text of ["", "   ", "\t\n"]) {
      const s1 = tasksReducer(initialState, { type: "add-task", id: "t1", text });
      expect(s1).toBe(initialState);
    }
  });

  it("ignores an id that is already present", () => {
    const s1 = withTasks("a");
    const s2 = tasksReducer(s1, { type: "add-task", id: "t1", text: "b" });
    expect(s2).toBe(s1);
    expect(s2.tasks).toHaveLength(1);
  });

  it("keeps insertion order", () => {
    const s1 = withTasks("Buy milk", "Walk dog");
    expect(s1.tasks.map(({ text, completed }) => ({ text, completed }))).toEqual([
      { text: "Buy milk", completed: false },
      { text: "Walk dog", completed: false },
    ]);
  });

  it("toggles only the matching task", () => {
    const s1 = withTasks("Buy milk", "Walk dog");
    const s2 = tasksReducer(s1, { type: "toggle-task", id: "t1" });
    expect(s2.tasks[0].completed).toBe(true);
    expect(s2.tasks[1]).toBe(s1.tasks[1]);
  });

  it("restores the flag when toggled twice", () => {
    const s1 = withTasks("a");
    const s2 = tasksReducer(s1, { type: "toggle-task", id: "t1" });
    const s3 = tasksReducer(s2, { type: "toggle-task", id: "t1" });
    expect(s3.tasks).toEqual(s1.tasks);
  });

  it("leaves state untouched when toggling an unknown id", () => {
    const s1 = withTasks("a", "b");
    const s2 = tasksReducer(s1, { type: "toggle-task", id: "missing" });
    expect(s2).toBe(s1);
    expect(s2.tasks).toEqual([
      { id: "t1", text: "a", completed: false },
      { id: "t2", text: "b", completed: false },
    ]);
  });

  it("deletes exactly one task and is idempotent", () => {
    const s1 = withTasks("a", "b", "c");
    const s2 = tasksReducer(s1, { type: "delete-task", id: "t2" });
    expect(s2.tasks.map((t) => t.id)).toEqual(["t1", "t3"]);
    const s3 = tasksReducer(s2, { type: "delete-task", id: "t2" });
    expect(s3).toBe(s2);
  });

  it("runs the add, toggle, delete scenario", () => {
    const s1 = withTasks("Buy milk", "Walk dog");
    const s2 = tasksReducer(s1, { type: "toggle-task", id: "t1" });
    expect(s2.tasks[1].completed).toBe(false);
    const s3 = tasksReducer(s2, { type: "delete-task", id: "t2" });
    expect(s3.tasks).toEqual([{ id: "t1", text: "Buy milk", completed: true }]);
  });

  it("stores the draft as typed", () => {
    const s1 = tasksReducer(initialState, { type: "set-draft", text: " Walk" });
    expect(s1.draft).toBe(" Walk");
  });

  it("submits the draft and clears it", () => {
    const s1 = tasksReducer(initialState, { type: "set-draft", text: " Walk dog " });
    const s2 = tasksReducer(s1, { type: "submit-draft", id: "t1" });
    expect(s2.tasks).toEqual([{ id: "t1", text: "Walk dog", completed: false }]);
    expect(s2.draft).toBe("");
  });

  it("keeps a blank draft on submit", () => {
    const s1 = tasksReducer(initialState, { type: "set-draft", text: "   " });
    const s2 = tasksReducer(s1, { type: "submit-draft", id: "t1" });
    expect(s2).toBe(s1);
    expect(s2.draft).toBe("   ");
  });
});

describe("isBlank", () => {
  it("treats whitespace as blank", () => {
    expect(isBlank(" \t")).toBe(true);
    expect(isBlank(" a ")).toBe(false);
  });
});
