export { SQLiteGateway } from './sqlite-gateway';
export { PostgreSQLGateway } from './postgres-gateway';
export { MySQLGateway } from './mysql-gateway';
export { OracleGateway } from './oracle-gateway';
