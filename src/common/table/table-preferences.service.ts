import { Injectable } from '@nestjs/common';

/** Per-user storage of the columns a user chose to see in a table. */
export interface ColumnPreferenceStore {
  getVisibleColumns(username: string, tableId: string): string[] | undefined;
  setVisibleColumns(username: string, tableId: string, columns: string[]): void;
}

/**
 * Process-local column preferences, kept for the lifetime of the server
 * like a session would be.
 */
@Injectable()
export class TablePreferencesService implements ColumnPreferenceStore {
  private readonly preferences = new Map<string, string[]>();

  getVisibleColumns(username: string, tableId: string): string[] | undefined {
    const stored = this.preferences.get(this.key(username, tableId));
    return stored ? [...stored] : undefined;
  }

  setVisibleColumns(username: string, tableId: string, columns: string[]): void {
    this.preferences.set(this.key(username, tableId), [...columns]);
  }

  private key(username: string, tableId: string): string {
    return `${username}:table_${tableId}_visible_columns`;
  }
}
