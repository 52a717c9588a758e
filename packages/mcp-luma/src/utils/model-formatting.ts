import {
  ASPECT_RATIOS,
  VIDEO_DURATIONS,
  VIDEO_RESOLUTIONS,
  type KnownModel,
} from '../constants/models.ts';

export function formatKnownModel(model: KnownModel): string {
  const tool = model.kind === 'image' ? 'create_image' : 'create_video';
  const lines = [
    `**${model.name}**`,
    `- **Model ID:** \`${model.id}\` (pass as \`model\` to \`${tool}\`)`,
    `- Description: ${model.description}`,
    `- Typical generation time: ${model.typicalLatency}`,
  ];
  if (model.kind === 'video') {
    lines.push(
      `- Resolution: ${model.supportsResolution ? VIDEO_RESOLUTIONS.join(', ') : 'fixed by provider'}`,
      `- Duration: ${model.supportsDuration ? VIDEO_DURATIONS.join(', ') : 'fixed by provider'}`,
    );
  }
  lines.push(`- Recommended for: ${model.recommended_for.join(', ')}`);
  return lines.join('\n');
}

/** Build the usage section text for list_models output. */
export function buildListModelsUsageText(): string {
  return `## Usage

All models accept \`aspect_ratio\`: ${ASPECT_RATIOS.join(', ')}.

\`\`\`json
{
  "prompt": "A lighthouse on a cliff at dusk, waves breaking below, warm window light",
  "model": "photon-1",
  "aspect_ratio": "16:9"
}
\`\`\`

Pass the \`generation_id\` of an image as \`frame0_id\` or \`frame1_id\` to \`create_video\` to animate it.`;
}
