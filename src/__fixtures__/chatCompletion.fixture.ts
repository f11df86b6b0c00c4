import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

export const chatCompletion = (
  content: string | null,
  refusal: string | null = null
): ChatCompletion => ({
  id: "chatcmpl-test",
  object: "chat.completion",
  created: 1760000000,
  model: "gpt-4o",
  choices: [
    {
      index: 0,
      finish_reason: "stop",
      logprobs: null,
      message: { role: "assistant", content, refusal },
    },
  ],
});

export const mockCreate = () =>
  jest.fn<Promise<ChatCompletion>, [ChatCompletionCreateParamsNonStreaming]>();
