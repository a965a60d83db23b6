import { PromptTemplate } from '@langchain/core/prompts';

/** Stands in for the context when retrieval found nothing usable. */
export const NO_CONTEXT_MARKER = 'NO RELEVANT CONTEXT FOUND';

export const qaSystemPrompt = `You are a careful assistant answering questions about the user's documents.
Use only the numbered context passages you are given. Cite passages as [n] after the
sentences that rely on them. When the context is ${NO_CONTEXT_MARKER} or does not hold the
answer, say that the documents do not cover the question. Never invent facts.`;

export const qaPrompt = PromptTemplate.fromTemplate(`Context:
{context}

Question: {question}

Answer:`);

export const formatContextHeader = (
  n: number,
  filename: string,
  sequenceIndex: number
): string => `[${n}] ${filename} (part ${sequenceIndex + 1})\n`;
