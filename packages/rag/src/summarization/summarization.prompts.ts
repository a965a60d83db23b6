import { PromptTemplate } from '@langchain/core/prompts';

export const summarySystemPrompt = `You write faithful, concise summaries.
Keep the key facts, names and figures. Do not add information that is not in the text.
Reply with the summary only, as plain prose.`;

export const singlePassPrompt = PromptTemplate.fromTemplate(`Summarize the following text in at most {maxWords} words.

Text:
{text}

Summary:`);

export const mapPrompt = PromptTemplate.fromTemplate(`This is part {part} of {parts} of a longer text.
Summarize this part in at most {maxWords} words, keeping every fact a final summary may need.

Part:
{text}

Summary of part {part}:`);

export const reducePrompt = PromptTemplate.fromTemplate(`The following are summaries of consecutive parts of one text, in order.
Combine them into a single summary of the whole text in at most {maxWords} words.

Part summaries:
{summaries}

Summary:`);
