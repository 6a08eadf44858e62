export type { RecordedRequest, StubResponse, StubHandler, StubFetch } from "./http.js";
export { createStubFetch, createFailingFetch, createStalledFetch } from "./http.js";
export type { ScriptedPrompter } from "./prompt.js";
export { createScriptedPrompter } from "./prompt.js";
export type { CapturedStream } from "./output.js";
export { captureStream } from "./output.js";
