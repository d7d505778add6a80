import 'dotenv/config';
import { createCourseAssistant } from '../lib/assistant';
import { loadConfig } from '../lib/config';

async function main() {
  const question = process.argv.slice(2).join(' ').trim();
  if (!question) {
    console.error('Usage: npm run ask -- "<question>"');
    process.exit(1);
  }

  const assistant = createCourseAssistant(loadConfig());
  const result = await assistant.query(question);

  console.log('\nAnswer:');
  console.log(result.answer);

  console.log('\nSources:');
  if (result.sources.length === 0) {
    console.log('  (none)');
  }
  result.sources.forEach((s) => {
    const lesson = s.lessonNumber === null ? '' : ` - Lesson ${s.lessonNumber}`;
    const link = s.lessonLink ? ` (${s.lessonLink})` : '';
    console.log(`  ${s.courseTitle}${lesson}${link}`);
  });

  console.log(`\nSession: ${result.sessionId}`);
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error('Failed:', error);
    process.exit(1);
  });
