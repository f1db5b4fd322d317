import { SECTION_DELIMITER, SECTION_TITLES } from '../config/constants';

export const ANALYSIS_SYSTEM_PROMPT =
  'You are an advanced AI disaster response coordinator with expertise in emergency management, risk assessment, and humanitarian aid.';

const sectionList = SECTION_TITLES.map((title) => `${SECTION_DELIMITER} ${title}`).join('\n');

export const ANALYSIS_PROMPT_TEMPLATE = `Advanced Disaster Analysis Protocol:

Emergency Report: '{{reportText}}'
Urgency Level: {{urgency}}

Comprehensive Analysis Requirements:
1. Identify precise disaster type
2. Provide detailed severity assessment
3. Outline immediate safety recommendations
4. Develop comprehensive emergency response strategy
5. Suggest resource allocation and prioritization

Structure the answer under these headings, in this order, each on its own line:
${sectionList}

Use "- " for list items. Analyze with scientific precision and humanitarian insight.`;
