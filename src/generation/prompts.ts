export type ProjectFields = {
  description: string;
  location: string;
  date: string;
  personas: string;
  themes: string;
};

const ROLE = "You are a dramaturgical expert that creates diegetic artefacts for architectural projects.";

const REASONING_FORMAT = `IMPORTANT: In your response, first share your reasoning process within <think> tags. Use this format:
<think>
Here I analyze what would be most effective for this project...
</think>

Then provide your final output after the thinking section. The <think> section won't be visible to the end user unless they choose to see it.`;

export const ANTHROPIC_SYSTEM_PROMPT = `${ROLE}

${REASONING_FORMAT}`;

export const OLLAMA_SYSTEM_PROMPT = ANTHROPIC_SYSTEM_PROMPT;

export const OPENAI_SYSTEM_PROMPT = `${ROLE}

IMPORTANT: Structure your response in exactly two parts:
1. First, a thinking section wrapped in <think> tags that explains your reasoning
2. Then, the final artifact output after a clear closing </think> tag

Example structure:
<think>
Your reasoning here...
</think>

Your final artifact here...`;

export const VISION_SYSTEM_PROMPT = `${ROLE}

You have been provided with visual materials (sketches, diagrams, photographs, or reference images) along with text descriptions.

IMPORTANT: First, carefully analyze the provided images:
1. Spatial organization, layout, and relationships
2. Annotations, labels, or handwritten notes (OCR)
3. Material indications and aesthetic qualities
4. Scale, proportion, and atmospheric intentions
5. Site context and environmental factors
6. Any diagrams or visual information systems

Then share your visual analysis within <think> tags before creating the final artifact.`;

export const ANTHROPIC_REASONING_REMINDER =
  "IMPORTANT: First explain your reasoning within <think> tags before creating the final artifact. This thinking will help me understand your creative process.";

export const OLLAMA_REASONING_REMINDER = "First explain your reasoning within <think> tags before creating the final artifact.";

export const OPENAI_REASONING_REMINDER =
  "IMPORTANT: Begin with your reasoning in <think> tags, then close the tag with </think> before providing the final artifact.";

export function tokenGuidance(safeTokens: number): string {
  return `Your response should be complete and no longer than approximately ${safeTokens} tokens.`;
}

function projectBlock(project: ProjectFields): string {
  return `Project Information:
Description: ${project.description}
Location: ${project.location}
Date/Timeframe: ${project.date}
User Personas: ${project.personas}
Key Themes: ${project.themes}`;
}

export function buildArtefactPrompt(input: {
  project: ProjectFields;
  category: string;
  closingInstruction: string;
  maxTokens: number;
}): string {
  const { project, category, closingInstruction, maxTokens } = input;
  return `${ROLE}
Your task is to imagine and create a specific diegetic artefact within the category of '${category}' that exists within the narrative world of this project.
First, decide on an appropriate specific artefact type within this category that would be meaningful for this project.

${projectBlock(project)}

Instructions:
1. Begin by briefly explaining (100-150 words) your choice of specific artefact within the ${category} category.
2. Add a brief summary (2-3 sentences) explaining how this artefact relates to the project's themes and context.
3. Pose 2-3 thought-provoking questions for the user to consider about the relationship between this artefact and the architecture project.
4. Finally, create the diegetic artefact itself (500-750 words) in the appropriate format and style using markdown syntax to ensure it is visibly distinct. Refer to ${closingInstruction} for additional abductive thinking opportunities. Ensure content is not truncated by the target word count and token limit. Rewrite to avoid this if necessary.

Markdown Formatting Guidelines:
- Use proper heading hierarchy (# for main title, ## for sections, ### for subsections)
- Format emphasis appropriately (* for italic, ** for bold)
- Use proper list formatting (- for unordered lists, 1. for ordered lists)
- Include line breaks between paragraphs for readability
- Use horizontal rules (---) to separate major sections

IMPORTANT: Your entire response must fit within ${maxTokens} tokens.
Structure your response to ensure your artefact is complete and not cut off.
The most important parts should come first, and conclude with a proper ending.

Begin your response:`;
}

export function buildVisionArtefactPrompt(input: {
  project: ProjectFields;
  category: string;
  closingInstruction: string;
}): string {
  const { project, category, closingInstruction } = input;
  return `${projectBlock(project)}

Artifact Category: ${category}

Instructions:
1. Analyze the visual materials I've shared - what spatial, material, and contextual information do they convey?
2. Explain (100-150 words) your choice of specific artefact within the ${category} category, informed by both visuals and text.
3. Summarize (2-3 sentences) how this artefact relates to the project's themes and visual context.
4. Pose 2-3 thought-provoking questions about the relationship between this artefact and the architecture project.
5. Create the diegetic artefact itself (500-750 words) using markdown. Reference specific elements from the visual materials. ${closingInstruction}

The artifact should feel grounded in the actual visual context you've seen, not generic assumptions.`;
}

/** Text block that follows the images in a vision request. */
export function visionTextBlock(imageCount: number, prompt: string): string {
  return `Please analyze the ${imageCount} image(s) I've shared above, then use that visual context along with this project description to create a diegetic artifact:

${prompt}

Remember to:
1. First explain your interpretation of the visual materials in <think> tags
2. Reference specific visual elements you observe (spaces, annotations, materials, etc.)
3. Then create the artifact that reflects both visual and textual context`;
}
