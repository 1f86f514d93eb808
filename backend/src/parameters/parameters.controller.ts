import { Body, Controller, Get, NotFoundException, Param, Put } from '@nestjs/common';
import { SetParameterDto } from './dto/set-parameter.dto';
import { ParameterStoreService } from './parameter-store.service';
import { ParameterDefinition } from './parameter.types';

type ParameterView = ParameterDefinition & { value: number };

@Controller('parameters')
export class ParametersController {
  constructor(private readonly store: ParameterStoreService) {}

  /**
   * GET /api/parameters
   */
  @Get()
  list(): ParameterView[] {
    return this.store.list();
  }

  /**
   * Set a value; it is clamped to the parameter's bounds
   * PUT /api/parameters/:name
   */
  @Put(':name')
  set(@Param('name') name: string, @Body() body: SetParameterDto): ParameterView {
    if (!this.store.has(name)) {
      throw new NotFoundException(`Unknown parameter ${name}`);
    }
    this.store.set(name, body.value);

    const view = this.store.list().find((parameter) => parameter.name === name);
    if (!view) {
      throw new NotFoundException(`Unknown parameter ${name}`);
    }
    return view;
  }
}
