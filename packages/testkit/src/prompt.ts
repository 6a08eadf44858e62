/**
 * Scripted prompter for credential tests
 */

export interface ScriptedPrompter {
  ask(question: string): Promise<string>;
  askSecret(question: string): Promise<string>;
  /** Questions asked visibly, in order */
  asked: string[];
  /** Questions asked with masked input, in order */
  askedSecret: string[];
}

/**
 * Answers come from the given lists in order; an exhausted list answers ""
 */
export function createScriptedPrompter(answers: { visible?: string[]; secret?: string[] } = {}): ScriptedPrompter {
  const visible = [...(answers.visible ?? [])];
  const secret = [...(answers.secret ?? [])];
  const asked: string[] = [];
  const askedSecret: string[] = [];

  return {
    asked,
    askedSecret,
    async ask(question: string): Promise<string> {
      asked.push(question);
      return visible.shift() ?? "";
    },
    async askSecret(question: string): Promise<string> {
      askedSecret.push(question);
      return secret.shift() ?? "";
    },
  };
}
