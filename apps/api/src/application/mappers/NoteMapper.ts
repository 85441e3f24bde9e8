import type { NoteDto } from '@notehint/types';
import { Note, Trigger } from '../../domain/entities/Note';
import { formatTimestamp, parseTimestamp } from '../../domain/entities/TimeOfDay';
import { AppError } from '../../domain/errors/AppError';

export class NoteMapper {
    /**
     * Trigger values are carried as-is; a Time trigger that does not parse
     * is skipped later by the analyzer, not rejected here.
     */
    static toDomain(dto: NoteDto): Note {
        const createdAt = NoteMapper.requireTimestamp(dto.createdAt, 'createdAt');
        const updatedAt = dto.updatedAt ? NoteMapper.requireTimestamp(dto.updatedAt, 'updatedAt') : null;

        return new Note(
            dto.text,
            dto.categoryType,
            createdAt,
            updatedAt,
            dto.triggers.map((t) => new Trigger(t.triggerType, t.triggerValue)),
        );
    }

    static toDto(note: Note): NoteDto {
        return {
            text: note.text,
            createdAt: formatTimestamp(note.createdAt),
            updatedAt: note.updatedAt ? formatTimestamp(note.updatedAt) : null,
            categoryType: note.category,
            triggers: note.triggers.map((t) => ({ triggerType: t.kind, triggerValue: t.value })),
        };
    }

    static requireTimestamp(value: string, field: string): Date {
        const date = parseTimestamp(value);
        if (!date) {
            throw new AppError(`Invalid ${field} '${value}'. Use 'YYYY-MM-DD HH:MM'`, 400);
        }
        return date;
    }
}
