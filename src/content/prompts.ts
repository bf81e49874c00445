export function blogTitlePrompt(topic: string, keywords: string[]): string {
  return `Generate an engaging and professional blog post title for the topic '${topic}' \
incorporating the keywords: ${keywords.join(', ')}. The title should be between 10-20 words, unique, and relevant.

Return only the title, no additional commentary`;
}

export function blogBodyPrompt(title: string, topic: string, keywords: string[]): string {
  return `Create a detailed 15-minute read blog post titled '${title}'.
Focus on the topic: '${topic}' and incorporate the following keywords: ${keywords.join(', ')}.

Requirements:
- Well-structured for developers and businesses
- Use proper HTML tags like <h1>, <h2>, <p> and <code>
- Include practical examples, analysis and applications`;
}

export function weeklyPlanPrompt(businessPlan: string): string {
  return `You are an experienced content strategist. Based on the following business plan, \
generate a detailed weekly content plan for both blogging and social media.

For each day of the week, provide:
- A blog post title
- A blog post topic
- A list of relevant keywords
- Ideas for accompanying social media posts (platform-specific if possible)

Make sure the recommendations are actionable and clearly formatted.

Business Plan: ${businessPlan}`;
}

export function socialDraftPrompt(channel: string, mainContent: string): string {
  return `Generate a ${channel} post based on this content:

${mainContent}

The post should be engaging and professional. Please do not include any emojis.
Return only the post content, no additional commentary`;
}

/** Source text the social drafts are written from. */
export function socialSourceText(title: string, topic: string, keywords: string[]): string {
  return `Blog Title: ${title}\nBlog Topic: ${topic}\nKeywords: ${keywords.join(', ')}`;
}
