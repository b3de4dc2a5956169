import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { AuthenticatedUserContext } from '../auth/jwt.strategy';
import { CoursesService } from './courses.service';
import { LessonsService } from './lessons.service';
import { GenerateCourseDto } from './dto/generate-course.dto';
import { UpdateProgressDto } from './dto/update-progress.dto';
import {
  CourseResponse,
  LessonContentResponse,
  ProgressResponse,
} from './course.mapper';

type AuthenticatedRequest = { user: AuthenticatedUserContext };

@Controller('api/courses')
@UseGuards(JwtAuthGuard)
export class CoursesController {
  constructor(
    private readonly coursesService: CoursesService,
    private readonly lessonsService: LessonsService,
  ) {}

  @Post('generate')
  @HttpCode(HttpStatus.CREATED)
  async generate(
    @Body() generateCourseDto: GenerateCourseDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<CourseResponse> {
    return this.coursesService.generateCourse(req.user.id, generateCourseDto);
  }

  @Get('user/courses')
  async findAll(@Request() req: AuthenticatedRequest): Promise<CourseResponse[]> {
    return this.coursesService.findAll(req.user.id);
  }

  @Get('lessons/:id')
  async getLesson(
    @Param('id', ParseUUIDPipe) id: string,
    @Request() req: AuthenticatedRequest,
  ): Promise<LessonContentResponse> {
    return this.lessonsService.getLesson(id, req.user.id);
  }

  @Post('lessons/:id/progress')
  @HttpCode(HttpStatus.OK)
  async updateLessonProgress(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateProgressDto: UpdateProgressDto,
    @Request() req: AuthenticatedRequest,
  ): Promise<ProgressResponse> {
    return this.lessonsService.updateProgress(
      id,
      req.user.id,
      updateProgressDto,
    );
  }

  @Get(':id')
  async findOne(
    @Param('id', ParseUUIDPipe) id: string,
    @Request() req: AuthenticatedRequest,
  ): Promise<CourseResponse> {
    return this.coursesService.findOne(id, req.user.id);
  }

  @Get(':id/progress')
  async getProgress(
    @Param('id', ParseUUIDPipe) id: string,
    @Request() req: AuthenticatedRequest,
  ): Promise<ProgressResponse[]> {
    return this.coursesService.getProgress(id, req.user.id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(
    @Param('id', ParseUUIDPipe) id: string,
    @Request() req: AuthenticatedRequest,
  ): Promise<void> {
    return this.coursesService.delete(id, req.user.id);
  }
}
