import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

export class CreatePermissionTables1792368000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    // Create permissions table
    await queryRunner.createTable(
      new Table({
        name: 'permissions',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'principal_name',
            type: 'varchar',
            length: '32',
            isNullable: false,
          },
          {
            name: 'principal_host',
            type: 'varchar',
            length: '64',
            isNullable: false,
          },
          {
            name: 'resource_name',
            type: 'varchar',
            length: '129',
            isNullable: false,
          },
          {
            name: 'type',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'start_time',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'end_time',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            default: "'PENDING'",
            isNullable: false,
          },
          {
            name: 'description',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'created_by',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'approved_by',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          {
            name: 'approved_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'revoked_by',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          {
            name: 'revoked_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
          {
            name: 'updated_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    // Create CHECK constraints for enum values
    await queryRunner.query(`
      ALTER TABLE permissions
      ADD CONSTRAINT check_permission_type
      CHECK (type IN ('READ', 'WRITE', 'DELETE', 'EXECUTE', 'ADMIN'));
    `);

    await queryRunner.query(`
      ALTER TABLE permissions
      ADD CONSTRAINT check_permission_status
      CHECK (status IN ('PENDING', 'APPROVED', 'ACTIVE', 'EXPIRED', 'REVOKED'));
    `);

    await queryRunner.query(`
      ALTER TABLE permissions
      ADD CONSTRAINT check_permission_time_range
      CHECK (end_time > start_time);
    `);

    // Sweeper scans ACTIVE rows by end time
    await queryRunner.createIndex(
      'permissions',
      new TableIndex({
        name: 'IDX_permissions_status_end_time',
        columnNames: ['status', 'end_time'],
      }),
    );

    await queryRunner.createIndex(
      'permissions',
      new TableIndex({
        name: 'IDX_permissions_principal',
        columnNames: ['principal_name', 'principal_host'],
      }),
    );

    // Create permission_events table (append-only audit trail)
    await queryRunner.createTable(
      new Table({
        name: 'permission_events',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'permission_id',
            type: 'integer',
            isNullable: false,
          },
          {
            name: 'event_type',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'triggered_by',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'details',
            type: 'text',
            isNullable: false,
          },
          {
            name: 'success',
            type: 'boolean',
            default: true,
            isNullable: false,
          },
          {
            name: 'event_time',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createForeignKey(
      'permission_events',
      new TableForeignKey({
        columnNames: ['permission_id'],
        referencedTableName: 'permissions',
        referencedColumnNames: ['id'],
        onDelete: 'RESTRICT',
      }),
    );

    await queryRunner.query(`
      ALTER TABLE permission_events
      ADD CONSTRAINT check_permission_event_type
      CHECK (event_type IN ('CREATED', 'APPROVED', 'ACTIVATED', 'EXPIRED', 'REVOKED', 'EXTENDED', 'MODIFIED'));
    `);

    await queryRunner.createIndex(
      'permission_events',
      new TableIndex({
        name: 'IDX_permission_events_permission_id',
        columnNames: ['permission_id'],
      }),
    );

    await queryRunner.createIndex(
      'permission_events',
      new TableIndex({
        name: 'IDX_permission_events_event_time',
        columnNames: ['event_time'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('permission_events', true, true, true);
    await queryRunner.dropTable('permissions', true, true, true);
  }
}
