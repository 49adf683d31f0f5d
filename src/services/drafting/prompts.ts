import type { DraftInput } from './drafter.js';

const MAX_PROMPT_COMMENTS = 5;
const MAX_COMMENT_CHARS = 500;

export function buildDrafterSystemPrompt(productName: string): string {
  return `You are helping draft Reddit responses for ${productName}, an educational platform for children ages 2-8 focusing on personalized learning, SEL, and special needs support.

Guidelines:
- Be genuinely helpful first, promotional second
- Share relevant free resources when possible
- Only mention ${productName} if it directly solves their problem
- Match the subreddit's tone and culture
- Avoid being salesy or pushy
- Focus on the child's needs and development
- Use a warm, supportive tone
- Provide specific, actionable advice

Response structure:
1. Acknowledge their situation and show empathy
2. Share relevant free resources or advice
3. If ${productName} is relevant, mention it naturally
4. End with encouragement and support

You are writing as a helpful parent or educator peer, not a salesperson.`;
}

export function buildDraftPrompt(input: DraftInput, variations: number): string {
  const comments = input.comments
    .slice(0, MAX_PROMPT_COMMENTS)
    .map((c) => `- ${c.body.length > MAX_COMMENT_CHARS ? `${c.body.slice(0, MAX_COMMENT_CHARS)}…` : c.body}`)
    .join('\n');
  const painPoints = input.assessment.painPoints.length > 0 ? input.assessment.painPoints.join(', ') : 'none identified';

  return `CONTEXT:
Subreddit: ${input.source}
Original post: ${input.post.title}
${input.post.selftext}

Top comments:
${comments || '(none)'}

USER TYPE: ${input.assessment.userType}
PAIN POINTS: ${painPoints}

Write ${variations} different response variations that are helpful and empathetic, natural and conversational, and tailored to this situation. Mention the product only where it fits.

End each variation with its own line in the form:
Relevance Score: <number from 0 to 1 for how well it matches the poster's needs>`;
}
