import { ValidationError } from '@/domain/errors';
import { encodeSequence } from '@/domain/sequence/sequenceCodec';
import { compileSequence, parseSequenceDocument, type CompileOptions } from '@/domain/sequence/sequenceDocument';
import type { CompiledSequence } from '@/domain/sequence/types';
import type { StoragePort } from '@/ports/StoragePort';
import { createLogger } from '@/shared/logging/logger';
import { programChecksum } from '@/shared/utils/checksum';

export interface CompiledProgram {
  sequence: CompiledSequence;
  program: Buffer;
  checksum: string;
}

export interface CompiledFile extends CompiledProgram {
  inputPath: string;
  outputPath: string;
}

/**
 * JSON sequence document -> `.prg` bytes, optionally through storage.
 */
export class SequenceCompiler {
  private readonly log = createLogger('Compile');

  constructor(
    private readonly storage: StoragePort,
    private readonly options: CompileOptions = {},
  ) {}

  public compileDocument(raw: unknown): CompiledProgram {
    const sequence = compileSequence(parseSequenceDocument(raw), this.options);
    const program = encodeSequence(sequence);
    const checksum = programChecksum(program);
    this.log.debug('program encoded', {
      segments: sequence.segments.length,
      pixels: sequence.pixelCount,
      refreshRate: sequence.refreshRate,
      bytes: program.length,
      checksum,
    });
    return { sequence, program, checksum };
  }

  public async compileFile(inputPath: string, outputPath: string): Promise<CompiledFile> {
    const text = (await this.storage.readBinary(inputPath)).toString('utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ValidationError('invalid-document', 'sequence file is not valid JSON', {
        inputPath,
        message: error instanceof Error ? error.message : String(error),
      });
    }
    const compiled = this.compileDocument(raw);
    await this.storage.writeBinary(outputPath, compiled.program);
    this.log.info('program written', {
      inputPath,
      outputPath,
      bytes: compiled.program.length,
      checksum: compiled.checksum,
    });
    return { ...compiled, inputPath, outputPath };
  }
}
