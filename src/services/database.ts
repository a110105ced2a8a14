import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { logger } from '../utils/logger.js';
import { getEnvironmentConfig } from '../server/config/environment.js';
import { decodePositionMessage, getProtobufRoot, type PositionMessage } from '../server/protobufLoader.js';
import { formatNodeId } from '../utils/nodeHelpers.js';
import { precisionMetersFromBits } from '../utils/positionPrecision.js';
import type {
  LocationFix,
  NodeLocation,
  TraceroutePacketQuery,
  TraceroutePacketRow,
  TracerouteStore
} from '../types/traceroute.js';

export const TRACEROUTE_PORTNUM_NAME = 'TRACEROUTE_APP';
export const POSITION_PORTNUM = 3;

// Receptions without a mesh packet id are matched by sender within this window
const RECEPTION_WINDOW_SECONDS = 2;

// SQLite's bound-parameter limit is far above this; chunks keep statements small
const IN_CLAUSE_CHUNK_SIZE = 500;

export interface DbPacketHistory {
  id: number;
  timestamp: number;
  topic: string;
  from_node_id: number | null;
  to_node_id: number | null;
  portnum: number | null;
  portnum_name: string | null;
  gateway_id: string | null;
  channel_id: string | null;
  mesh_packet_id: number | null;
  rssi: number | null;
  snr: number | null;
  hop_limit: number | null;
  hop_start: number | null;
  payload_length: number | null;
  raw_payload: Buffer | null;
  processed_successfully: number | null;
}

export interface DbNodeInfo {
  node_id: number;
  hex_id: string | null;
  long_name: string | null;
  short_name: string | null;
  hw_model: string | null;
  role: string | null;
  primary_channel: string | null;
  first_seen: number;
  last_updated: number;
}

export type NewPacketHistory = Omit<Partial<DbPacketHistory>, 'id' | 'raw_payload'> & {
  timestamp: number;
  raw_payload?: Uint8Array | null;
};

export type NewNodeInfo = Partial<Omit<DbNodeInfo, 'node_id'>> & { node_id: number };

interface PositionRow {
  timestamp: number;
  raw_payload: Buffer | null;
}

interface LatestPositionRow extends PositionRow {
  from_node_id: number;
  hex_id: string | null;
  long_name: string | null;
  short_name: string | null;
  hw_model: string | null;
  role: string | null;
}

type PacketRowSelection = Pick<
  DbPacketHistory,
  | 'id'
  | 'timestamp'
  | 'from_node_id'
  | 'to_node_id'
  | 'gateway_id'
  | 'mesh_packet_id'
  | 'hop_start'
  | 'hop_limit'
  | 'raw_payload'
  | 'processed_successfully'
>;

const PACKET_COLUMNS = `
  id, timestamp, from_node_id, to_node_id, gateway_id, mesh_packet_id,
  hop_start, hop_limit, raw_payload, processed_successfully
`;

function chunk<T>(values: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decode a stored POSITION_APP payload into a fix.
 * Returns null for undecodable payloads and for missing or zero coordinates.
 * Throws when the protobuf definitions have not been loaded.
 */
export function decodeLocationFix(timestamp: number, payload: Uint8Array | null): LocationFix | null {
  if (!payload || payload.length === 0) {
    return null;
  }
  if (!getProtobufRoot()) {
    throw new Error('Protobuf definitions not loaded; call loadProtobufDefinitions() first');
  }

  let position: PositionMessage;
  try {
    position = decodePositionMessage(payload);
  } catch (error) {
    logger.debug(`Skipping undecodable position payload at ${timestamp}:`, errorMessage(error));
    return null;
  }

  if (!position.latitudeI || !position.longitudeI) {
    return null;
  }

  return {
    latitude: position.latitudeI / 1e7,
    longitude: position.longitudeI / 1e7,
    altitude: position.altitude,
    timestamp,
    precisionBits: position.precisionBits,
    precisionMeters: precisionMetersFromBits(position.precisionBits),
    satsInView: position.satsInView
  };
}

/**
 * Read access to the packet capture database.
 *
 * The capture process owns the schema; tables are created here only when
 * missing so that a fresh file (or an in-memory test database) is usable.
 */
export class DatabaseService implements TracerouteStore {
  public db: Database.Database;
  private isInitialized = false;

  constructor(dbPath: string = getEnvironmentConfig().databasePath) {
    logger.debug('Initializing database at:', dbPath);

    if (dbPath !== ':memory:') {
      this.validateDatabasePath(dbPath);
    }

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('busy_timeout = 5000'); // 5 second timeout for locked database
    } catch (error: unknown) {
      logger.error('❌ DATABASE OPEN ERROR ❌');
      logger.error(`Failed to open SQLite database at: ${dbPath}`);
      if (errorCode(error) === 'SQLITE_CANTOPEN') {
        logger.error('SQLITE_CANTOPEN - check directory permissions, disk space and file locks');
      } else {
        logger.error(`Error: ${errorMessage(error)}`);
        logger.error(`Error code: ${errorCode(error) || 'unknown'}`);
      }
      throw new Error(`Database initialization failed: ${errorMessage(error)}`);
    }

    this.initialize();
  }

  private validateDatabasePath(dbPath: string): void {
    const dbDir = path.dirname(dbPath);
    try {
      if (!fs.existsSync(dbDir)) {
        logger.debug(`Creating database directory: ${dbDir}`);
        fs.mkdirSync(dbDir, { recursive: true });
      }

      fs.accessSync(dbDir, fs.constants.W_OK | fs.constants.R_OK);

      if (fs.existsSync(dbPath)) {
        fs.accessSync(dbPath, fs.constants.W_OK | fs.constants.R_OK);
      }
    } catch (error: unknown) {
      const code = errorCode(error);
      logger.error('❌ DATABASE STARTUP ERROR ❌');
      logger.error(`Database path: ${dbPath}`);
      if (code === 'EACCES' || code === 'EPERM') {
        logger.error('PERMISSION DENIED - The database directory or file is not writable.');
        logger.error(`  mkdir -p ${dbDir} && chmod 755 ${dbDir}`);
      } else if (code === 'ENOENT') {
        logger.error(`DIRECTORY NOT FOUND - Check that the parent directory exists: ${path.dirname(dbDir)}`);
      } else {
        logger.error(`Error: ${errorMessage(error)}`);
      }
      throw new Error(`Database directory access check failed: ${errorMessage(error)}`);
    }
  }

  private initialize(): void {
    if (this.isInitialized) return;

    this.createTables();
    this.createIndexes();

    this.isInitialized = true;
  }

  private createTables(): void {
    logger.debug('Creating database tables...');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS packet_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp REAL NOT NULL,
        topic TEXT NOT NULL DEFAULT '',
        from_node_id INTEGER,
        to_node_id INTEGER,
        portnum INTEGER,
        portnum_name TEXT,
        gateway_id TEXT,
        channel_id TEXT,
        mesh_packet_id INTEGER,
        rssi INTEGER,
        snr REAL,
        hop_limit INTEGER,
        hop_start INTEGER,
        payload_length INTEGER,
        raw_payload BLOB,
        processed_successfully BOOLEAN DEFAULT TRUE
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS node_info (
        node_id INTEGER PRIMARY KEY,
        hex_id TEXT,
        long_name TEXT,
        short_name TEXT,
        hw_model TEXT,
        role TEXT,
        primary_channel TEXT,
        first_seen REAL NOT NULL,
        last_updated REAL NOT NULL
      );
    `);
  }

  private createIndexes(): void {
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_packet_timestamp ON packet_history(timestamp);
      CREATE INDEX IF NOT EXISTS idx_packet_from_node ON packet_history(from_node_id);
      CREATE INDEX IF NOT EXISTS idx_packet_portnum_time ON packet_history(portnum_name, timestamp);
      CREATE INDEX IF NOT EXISTS idx_packet_position ON packet_history(portnum, from_node_id, timestamp);
    `);
  }

  close(): void {
    this.db.close();
  }

  /**
   * Append a captured packet. Used by imports and test fixtures; live capture
   * happens outside this service.
   */
  insertPacket(packet: NewPacketHistory): number {
    const stmt = this.db.prepare(`
      INSERT INTO packet_history (
        timestamp, topic, from_node_id, to_node_id, portnum, portnum_name,
        gateway_id, channel_id, mesh_packet_id, rssi, snr, hop_limit, hop_start,
        payload_length, raw_payload, processed_successfully
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const payload = packet.raw_payload ? Buffer.from(packet.raw_payload) : null;
    const result = stmt.run(
      packet.timestamp,
      packet.topic ?? '',
      packet.from_node_id ?? null,
      packet.to_node_id ?? null,
      packet.portnum ?? null,
      packet.portnum_name ?? null,
      packet.gateway_id ?? null,
      packet.channel_id ?? null,
      packet.mesh_packet_id ?? null,
      packet.rssi ?? null,
      packet.snr ?? null,
      packet.hop_limit ?? null,
      packet.hop_start ?? null,
      packet.payload_length ?? payload?.length ?? 0,
      payload,
      packet.processed_successfully ?? 1
    );
    return Number(result.lastInsertRowid);
  }

  upsertNodeInfo(node: NewNodeInfo): void {
    const now = Date.now() / 1000;
    const stmt = this.db.prepare(`
      INSERT INTO node_info (
        node_id, hex_id, long_name, short_name, hw_model, role, primary_channel, first_seen, last_updated
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(node_id) DO UPDATE SET
        hex_id = COALESCE(excluded.hex_id, hex_id),
        long_name = COALESCE(excluded.long_name, long_name),
        short_name = COALESCE(excluded.short_name, short_name),
        hw_model = COALESCE(excluded.hw_model, hw_model),
        role = COALESCE(excluded.role, role),
        primary_channel = COALESCE(excluded.primary_channel, primary_channel),
        last_updated = excluded.last_updated
    `);
    stmt.run(
      node.node_id,
      node.hex_id ?? formatNodeId(node.node_id),
      node.long_name ?? null,
      node.short_name ?? null,
      node.hw_model ?? null,
      node.role ?? null,
      node.primary_channel ?? null,
      node.first_seen ?? now,
      node.last_updated ?? now
    );
  }

  private buildTracerouteFilter(query: Omit<TraceroutePacketQuery, 'limit' | 'offset'>): {
    where: string;
    params: Array<string | number>;
  } {
    const clauses = ['portnum_name = ?'];
    const params: Array<string | number> = [TRACEROUTE_PORTNUM_NAME];

    if (query.startTime !== undefined) {
      clauses.push('timestamp >= ?');
      params.push(query.startTime);
    }
    if (query.endTime !== undefined) {
      clauses.push('timestamp <= ?');
      params.push(query.endTime);
    }
    if (query.successOnly) {
      clauses.push('processed_successfully = 1');
    }
    if (query.fromNodeNum !== undefined) {
      clauses.push('from_node_id = ?');
      params.push(query.fromNodeNum);
    }
    if (query.toNodeNum !== undefined) {
      clauses.push('to_node_id = ?');
      params.push(query.toNodeNum);
    }
    if (query.gatewayId !== undefined) {
      clauses.push('gateway_id = ?');
      params.push(query.gatewayId);
    }

    return { where: `WHERE ${clauses.join(' AND ')}`, params };
  }

  private toTraceroutePacketRow(row: PacketRowSelection): TraceroutePacketRow {
    return {
      id: row.id,
      timestamp: row.timestamp,
      fromNodeNum: row.from_node_id,
      toNodeNum: row.to_node_id,
      gatewayId: row.gateway_id,
      meshPacketId: row.mesh_packet_id,
      hopStart: row.hop_start,
      hopLimit: row.hop_limit,
      rawPayload: row.raw_payload,
      processedSuccessfully: row.processed_successfully !== 0
    };
  }

  /**
   * Traceroute packets, newest first.
   */
  fetchTraceroutePackets(query: TraceroutePacketQuery): TraceroutePacketRow[] {
    const { where, params } = this.buildTracerouteFilter(query);
    const stmt = this.db.prepare<Array<string | number>, PacketRowSelection>(`
      SELECT ${PACKET_COLUMNS}
      FROM packet_history
      ${where}
      ORDER BY timestamp DESC, id DESC
      LIMIT ? OFFSET ?
    `);
    return stmt.all(...params, query.limit, query.offset ?? 0).map(row => this.toTraceroutePacketRow(row));
  }

  countTraceroutePackets(query: Omit<TraceroutePacketQuery, 'limit' | 'offset'>): number {
    const { where, params } = this.buildTracerouteFilter(query);
    const stmt = this.db.prepare<Array<string | number>, { count: number }>(`
      SELECT COUNT(*) AS count FROM packet_history ${where}
    `);
    return stmt.get(...params)?.count ?? 0;
  }

  fetchTraceroutePacketById(packetId: number): TraceroutePacketRow | null {
    const stmt = this.db.prepare<[number, string], PacketRowSelection>(`
      SELECT ${PACKET_COLUMNS}
      FROM packet_history
      WHERE id = ? AND portnum_name = ?
    `);
    const row = stmt.get(packetId, TRACEROUTE_PORTNUM_NAME);
    return row ? this.toTraceroutePacketRow(row) : null;
  }

  /**
   * Every reception of the traceroute `packetId`, the packet itself first and
   * the rest oldest first. Receptions share its mesh packet id; captures
   * without one fall back to the same sender within a couple of seconds.
   */
  fetchTracerouteReceptions(packetId: number): TraceroutePacketRow[] {
    const packet = this.fetchTraceroutePacketById(packetId);
    if (!packet) {
      return [];
    }

    const meshPacketId = packet.meshPacketId ?? null;
    let rows: PacketRowSelection[];
    if (meshPacketId !== null) {
      const stmt = this.db.prepare<[number, string, number], PacketRowSelection>(`
        SELECT ${PACKET_COLUMNS}
        FROM packet_history
        WHERE mesh_packet_id = ? AND portnum_name = ? AND id != ?
        ORDER BY timestamp ASC, id ASC
      `);
      rows = stmt.all(meshPacketId, TRACEROUTE_PORTNUM_NAME, packetId);
    } else if (packet.fromNodeNum !== null) {
      const stmt = this.db.prepare<[number, string, number, number, number], PacketRowSelection>(`
        SELECT ${PACKET_COLUMNS}
        FROM packet_history
        WHERE from_node_id = ? AND portnum_name = ? AND id != ?
          AND timestamp BETWEEN ? AND ?
        ORDER BY timestamp ASC, id ASC
      `);
      rows = stmt.all(
        packet.fromNodeNum,
        TRACEROUTE_PORTNUM_NAME,
        packetId,
        packet.timestamp - RECEPTION_WINDOW_SECONDS,
        packet.timestamp + RECEPTION_WINDOW_SECONDS
      );
    } else {
      rows = [];
    }

    return [packet, ...rows.map(row => this.toTraceroutePacketRow(row))];
  }

  /**
   * The node's most recent decodable fixes, newest first. Undecodable rows do
   * not count toward `limit`.
   */
  fetchLocationHistory(nodeNum: number, limit: number): LocationFix[] {
    const stmt = this.db.prepare<[number, number], PositionRow>(`
      SELECT timestamp, raw_payload
      FROM packet_history
      WHERE portnum = ? AND from_node_id = ? AND raw_payload IS NOT NULL
      ORDER BY timestamp DESC
    `);

    const fixes: LocationFix[] = [];
    if (limit <= 0) {
      return fixes;
    }
    for (const row of stmt.iterate(POSITION_PORTNUM, nodeNum)) {
      const fix = decodeLocationFix(row.timestamp, row.raw_payload);
      if (!fix) continue;
      fixes.push(fix);
      if (fixes.length >= limit) break;
    }
    return fixes;
  }

  fetchLocationAtOrBefore(nodeNum: number, timestamp: number): LocationFix | null {
    const stmt = this.db.prepare<[number, number, number], PositionRow>(`
      SELECT timestamp, raw_payload
      FROM packet_history
      WHERE portnum = ? AND from_node_id = ? AND timestamp <= ? AND raw_payload IS NOT NULL
      ORDER BY timestamp DESC
    `);
    return this.firstDecodableFix(stmt.iterate(POSITION_PORTNUM, nodeNum, timestamp));
  }

  fetchLocationAfter(nodeNum: number, timestamp: number): LocationFix | null {
    const stmt = this.db.prepare<[number, number, number], PositionRow>(`
      SELECT timestamp, raw_payload
      FROM packet_history
      WHERE portnum = ? AND from_node_id = ? AND timestamp > ? AND raw_payload IS NOT NULL
      ORDER BY timestamp ASC
    `);
    return this.firstDecodableFix(stmt.iterate(POSITION_PORTNUM, nodeNum, timestamp));
  }

  private firstDecodableFix(rows: IterableIterator<PositionRow>): LocationFix | null {
    for (const row of rows) {
      const fix = decodeLocationFix(row.timestamp, row.raw_payload);
      if (fix) return fix;
    }
    return null;
  }

  /**
   * Latest fix of every node (or of the given nodes) in one query per chunk.
   * A node whose newest position is unusable falls back to its newest usable
   * one.
   */
  fetchBulkLatestLocations(nodeNums?: number[]): Map<number, NodeLocation> {
    const locations = new Map<number, NodeLocation>();
    if (nodeNums && nodeNums.length === 0) {
      return locations;
    }

    const groups = nodeNums ? chunk([...new Set(nodeNums)], IN_CLAUSE_CHUNK_SIZE) : [null];
    for (const group of groups) {
      const nodeFilter = group ? `AND from_node_id IN (${group.map(() => '?').join(',')})` : '';
      const stmt = this.db.prepare<number[], LatestPositionRow>(`
        SELECT ph.from_node_id, ph.timestamp, ph.raw_payload,
               ni.hex_id, ni.long_name, ni.short_name, ni.hw_model, ni.role
        FROM packet_history ph
        JOIN (
          SELECT from_node_id, MAX(timestamp) AS max_timestamp
          FROM packet_history
          WHERE portnum = ? AND raw_payload IS NOT NULL AND from_node_id IS NOT NULL ${nodeFilter}
          GROUP BY from_node_id
        ) latest ON latest.from_node_id = ph.from_node_id AND latest.max_timestamp = ph.timestamp
        LEFT JOIN node_info ni ON ni.node_id = ph.from_node_id
        WHERE ph.portnum = ?
      `);

      for (const row of stmt.all(POSITION_PORTNUM, ...(group ?? []), POSITION_PORTNUM)) {
        if (locations.has(row.from_node_id)) continue;
        const fix =
          decodeLocationFix(row.timestamp, row.raw_payload) ??
          this.fetchLocationAtOrBefore(row.from_node_id, row.timestamp);
        if (!fix) continue;

        const nodeId = row.hex_id || formatNodeId(row.from_node_id);
        locations.set(row.from_node_id, {
          ...fix,
          nodeNum: row.from_node_id,
          nodeId,
          displayName: row.long_name || row.short_name || nodeId,
          longName: row.long_name,
          shortName: row.short_name,
          hwModel: row.hw_model,
          role: row.role
        });
      }
    }

    return locations;
  }

  /**
   * Display names for the given nodes. Every requested node gets an entry;
   * unknown nodes map to their `!hex` id.
   */
  bulkResolveNodeNames(nodeNums: number[]): Map<number, string> {
    const names = new Map<number, string>();
    const unique = [...new Set(nodeNums)];

    for (const group of chunk(unique, IN_CLAUSE_CHUNK_SIZE)) {
      const stmt = this.db.prepare<number[], Pick<DbNodeInfo, 'node_id' | 'hex_id' | 'long_name' | 'short_name'>>(`
        SELECT node_id, hex_id, long_name, short_name
        FROM node_info
        WHERE node_id IN (${group.map(() => '?').join(',')})
      `);
      for (const row of stmt.all(...group)) {
        const name = row.long_name || row.short_name || row.hex_id;
        if (name) names.set(row.node_id, name);
      }
    }

    for (const nodeNum of unique) {
      if (!names.has(nodeNum)) {
        names.set(nodeNum, formatNodeId(nodeNum));
      }
    }
    return names;
  }
}

let databaseService: DatabaseService | null = null;

/**
 * Shared database connection, opened on first use.
 */
export function getDatabaseService(): DatabaseService {
  if (!databaseService) {
    databaseService = new DatabaseService();
  }
  return databaseService;
}
