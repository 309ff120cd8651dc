/**
 * Prompt templates for the four enrichment sub-tasks. Each asks for a format
 * the matching parser in `content-parsers.ts` understands.
 */

export function summaryPrompt(content: string, title: string, maxWords: number): string {
  return `Create a clear, concise summary of this document in approximately ${String(maxWords)} words.

Document Title: ${title}

Content:
${content}

Requirements:
1. Focus on main themes and key insights
2. Write in clear, accessible language
3. Highlight important findings or conclusions
4. Maximum ${String(maxWords)} words

Summary:`;
}

export function keyPointsPrompt(content: string, count: number): string {
  return `Extract the ${String(count)} most important key points from this document.

Content:
${content}

Requirements:
1. Each point should be concise but informative (1-2 sentences)
2. Focus on factual information and insights
3. Avoid repetition
4. Order by importance
5. Return exactly ${String(count)} points

Format as a simple numbered list:
1. [First key point]
2. [Second key point]
...

Key Points:`;
}

export function qaPrompt(content: string, count: number): string {
  return `Create ${String(count)} relevant questions and answers based on this document content.

Content:
${content}

Requirements:
1. Questions should be specific to the document content
2. Answers should be informative and based on the text
3. Cover different aspects of the document
4. Answers should be 2-3 sentences each

Format:
Q1: [Question about main topic]
A1: [Detailed answer based on content]

Q2: [Question about specific details]
A2: [Detailed answer based on content]

... continue for ${String(count)} pairs

Q&A:`;
}

export function topicsPrompt(content: string, count: number): string {
  return `Identify the ${String(count)} main topics or themes in this document for creating a mind map.

Content:
${content}

Requirements:
1. Topics should be broad themes, not specific details
2. 1-3 words per topic
3. Cover the document comprehensively
4. Return exactly ${String(count)} topics

Format as a simple list:
- Topic 1
- Topic 2
...

Topics:`;
}

/** Numbered context block plus question, for answer synthesis. */
export function answerPrompt(question: string, context: string): string {
  return `Answer the question using only the numbered context passages below. Cite passages by their number in square brackets. If the context does not contain the answer, say so.

Context:
${context}

Question: ${question}

Answer:`;
}
