// src/container.ts
import 'reflect-metadata';
import 'dotenv/config';
import { container } from 'tsyringe';

// --- Core Application Services and Configurations ---
import { ConfigService, ENVIRONMENT } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { FileSystemService } from './services/fileSystem.service';

// --- Conversion Pipeline ---
import { RecordReaderService } from './services/recordReader.service';
import { SchemaValidatorService } from './services/schemaValidator.service';
import { FieldExtractorService } from './services/fieldExtractor.service';
import { CsvWriterService } from './services/csvWriter.service';
import { CallRecordPipelineService } from './services/callRecordPipeline.service';

// --- Test Data ---
import { SyntheticCallGeneratorService } from './services/syntheticCallGenerator.service';

/**
 * Configure the Tsyringe IoC container by registering all application services.
 */

// --- 1. Environment ---
container.register(ENVIRONMENT, { useValue: process.env });

// --- 2. Core Application Services (Singletons) ---
container.registerSingleton(ConfigService);
container.registerSingleton(LoggingService);
container.registerSingleton(FileSystemService);

// --- 3. Pipeline Stages ---
container.registerSingleton(RecordReaderService);
container.registerSingleton(SchemaValidatorService);
container.registerSingleton(FieldExtractorService);
container.registerSingleton(CsvWriterService);
container.registerSingleton(CallRecordPipelineService);

container.registerSingleton(SyntheticCallGeneratorService);

export default container;
