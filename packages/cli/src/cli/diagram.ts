import chalk from 'chalk';
import fs from 'fs/promises';
import { StructureAnalyzer, createStderrLogger, getErrorMessage, renderDiagram } from '@pyscope/parser';

interface DiagramOptions {
  verbose?: boolean;
}

/**
 * Print the Mermaid class diagram of one Python file.
 * The placeholder diagram is still printed when parsing fails.
 */
export async function diagramCommand(file: string, options: DiagramOptions = {}): Promise<void> {
  let source: string;
  try {
    source = await fs.readFile(file, 'utf-8');
  } catch (error) {
    console.error(chalk.red(`Error: Failed to read ${file}: ${getErrorMessage(error)}`));
    process.exit(1);
    return;
  }

  const analyzer = new StructureAnalyzer({ logger: createStderrLogger({ verbose: options.verbose }) });
  const result = analyzer.analyze(source, file);
  console.log(renderDiagram(result));

  if (!result.success) process.exit(1);
}
