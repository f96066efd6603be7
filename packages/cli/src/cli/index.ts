import { Command } from 'commander';
import { createRequire } from 'module';
import { analyzeCommand } from './analyze.js';
import { diagramCommand } from './diagram.js';
import { planCommand } from './plan.js';

// Same relative path from src/cli and dist/cli
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');

export const program = new Command();

program
  .name('pyscope')
  .description('Structural and complexity analysis for Python code')
  .version(packageJson.version);

program
  .command('analyze')
  .description('Analyze a Python file or project directory')
  .argument('<target>', 'Python file or directory to analyze')
  .option('--format <type>', 'Output format: text, json', 'text')
  .option('--diagram', 'Include a Mermaid class diagram for each file')
  .option('--fail-on-risk', 'Exit 1 if any risk area is found')
  .option('-v, --verbose', 'Show detailed logging on stderr')
  .action(analyzeCommand);

program
  .command('diagram')
  .description('Print the Mermaid class diagram of a Python file')
  .argument('<file>', 'Python file to diagram')
  .option('-v, --verbose', 'Show detailed logging on stderr')
  .action(diagramCommand);

program
  .command('plan')
  .description('Plan where each project file moves under a mapping, without moving anything')
  .argument('<directory>', 'Project directory to plan')
  .requiredOption('-m, --mapping <file>', 'Migration mapping YAML file')
  .option('--format <type>', 'Output format: text, json', 'text')
  .option('-v, --verbose', 'Show detailed logging on stderr')
  .action(planCommand);
