/**
 * Walk through the system engineering façade from the command line.
 * Usage: npm run build && npm run demo
 */
import { logger } from '../config/logger';
import { createSystemEngineeringService } from '../services/genai/SystemEngineeringService';

const SAMPLE_REQUIREMENTS = `System Requirements:
1. The system shall support 10,000 concurrent users
2. Page load time should be fast
3. Data must be backed up`;

async function main(): Promise<void> {
  const engineer = createSystemEngineeringService();

  if (!engineer.isEnabled()) {
    logger.warn('GenAI is not enabled', {
      hint: 'Create a .env file with OPENAI_API_KEY=<your key>, then rerun the demo.',
    });
    return;
  }

  logger.info('GenAI is enabled', { model: engineer.model });

  const result = await engineer.analyzeRequirements(SAMPLE_REQUIREMENTS);
  logger.info('Requirements analysis finished', { status: result.status });
  if (result.status === 'success') {
    logger.info(result.raw_response);
  } else {
    logger.warn(result.message);
  }
}

main().catch((e) => {
  logger.error('Demo failed:', e);
  process.exit(1);
});
