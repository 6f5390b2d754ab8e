import { MigrationInterface, QueryRunner, Table } from 'typeorm';

export class Tasks1747000000000 implements MigrationInterface {
  public get _tableName(): string {
    return 'tasks';
  }

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: this._tableName,
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
            primaryKeyConstraintName: `${this._tableName}_pk_idx`,
          },
          {
            name: 'task_id',
            type: 'text',
            isUnique: true,
          },
          {
            name: 'owner',
            type: 'text',
          },
          {
            name: 'status',
            type: 'text',
            default: `'queued'`,
          },
          {
            name: 'progress',
            type: 'integer',
            default: 0,
          },
          {
            name: 'message',
            type: 'text',
            default: `''`,
          },
          {
            name: 'file_id',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'display_name',
            type: 'text',
            default: `''`,
          },
          {
            name: 'settings_snapshot',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'outputs',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'error',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'token_usage',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'created_at',
            type: 'timestamp',
          },
          {
            name: 'started_at',
            type: 'timestamp',
            isNullable: true,
          },
          {
            name: 'completed_at',
            type: 'timestamp',
            isNullable: true,
          },
          {
            name: 'updated_at',
            type: 'timestamp',
            default: 'current_timestamp',
          },
        ],
        indices: [
          {
            name: `${this._tableName}_status_idx`,
            columnNames: ['status'],
          },
        ],
      }),
      true,
    );

    // History listing reads newest first per owner.
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "${this._tableName}_owner_created_at_idx" ON "${this._tableName}" ("owner", "created_at" DESC)`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP INDEX IF EXISTS "${this._tableName}_owner_created_at_idx"`,
    );
    await queryRunner.dropTable(this._tableName, true);
  }
}
