import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { CreateTimelineDto } from './dto/timeline.dto';
import { TimelineLibraryService } from './timeline-library.service';
import { TimelineController } from './timeline.controller';

describe('TimelineController', () => {
  let library: TimelineLibraryService;
  let controller: TimelineController;

  const custom = (): CreateTimelineDto => ({
    id: 'custom',
    name: 'Custom',
    durationMinutes: 5,
    events: [
      { id: 'a', featureId: 'flash', kind: 'start', minute: 0, pairedEventId: 'b' },
      { id: 'b', featureId: 'flash', kind: 'stop', minute: 3, pairedEventId: 'a' },
    ],
  });

  beforeEach(() => {
    library = new TimelineLibraryService();
    controller = new TimelineController(library);
  });

  it('deletes a custom timeline', () => {
    controller.create(custom());

    controller.remove('custom');

    expect(library.get('custom')).toBeUndefined();
  });

  it('refuses to delete a built-in timeline with a conflict', () => {
    expect(() => controller.remove('morning-drift')).toThrow(ConflictException);
    expect(library.get('morning-drift')).toBeDefined();
  });

  it('answers not found for an unknown timeline', () => {
    expect(() => controller.remove('missing')).toThrow(NotFoundException);
  });

  it('rejects an import whose starts share a stop', () => {
    const body = custom();
    body.events = [
      { id: 'a', featureId: 'flash', kind: 'start', minute: 0, pairedEventId: 's' },
      { id: 'b', featureId: 'flash', kind: 'start', minute: 1, pairedEventId: 's' },
      { id: 's', featureId: 'flash', kind: 'stop', minute: 4, pairedEventId: 'b' },
    ];

    expect(() => controller.create(body)).toThrow(BadRequestException);
    expect(library.get('custom')).toBeUndefined();
  });
});
