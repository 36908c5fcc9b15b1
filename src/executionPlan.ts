/**
 * Database providers a plan can be captured from
 */
export type DatabaseProvider = 'SqlServer' | 'PostgreSQL' | 'MySQL' | 'SQLite' | 'Other' | 'Unknown';

/**
 * Provider setting accepted in options; 'auto' follows the connection's dialect
 */
export type DatabaseProviderSetting = DatabaseProvider | 'auto';

export type PlanFormat = 'json' | 'xml' | 'text' | 'unknown';

export interface ExecutionPlan {
  readonly databaseProvider: DatabaseProvider;
  readonly planFormat: PlanFormat;
  readonly content: string;
}

export interface PlanFormatDescriptor {
  contentType: string;
  fileExtension: string;
  description: string;
}

const FORMAT_DESCRIPTORS: Record<PlanFormat, PlanFormatDescriptor> = {
  json: { contentType: 'application/json', fileExtension: 'json', description: 'JSON' },
  xml: { contentType: 'application/xml', fileExtension: 'xml', description: 'XML' },
  text: { contentType: 'text/plain', fileExtension: 'txt', description: 'Plain Text' },
  unknown: { contentType: 'text/plain', fileExtension: 'txt', description: 'Plain Text' },
};

export function describePlanFormat(format: PlanFormat): PlanFormatDescriptor {
  return { ...FORMAT_DESCRIPTORS[format] };
}

/**
 * Maps a Sequelize dialect name onto a plan provider
 */
export function providerFromDialect(dialect: string): DatabaseProvider {
  switch (dialect.toLowerCase()) {
    case 'mssql':
      return 'SqlServer';
    case 'postgres':
    case 'postgresql':
      return 'PostgreSQL';
    case 'mysql':
    case 'mariadb':
      return 'MySQL';
    case 'sqlite':
      return 'SQLite';
    case '':
      return 'Unknown';
    default:
      return 'Other';
  }
}

export function createExecutionPlan(
  databaseProvider: DatabaseProvider,
  planFormat: PlanFormat,
  content: string | null | undefined
): ExecutionPlan | null {
  if (!content) {
    return null;
  }
  return Object.freeze({ databaseProvider, planFormat, content });
}
