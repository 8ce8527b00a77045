import "reflect-metadata";
import path from "path";
import { config } from "dotenv";
import { DataSource } from "typeorm";
import { QuestionnaireTemplate } from "./entities/questionnaire-template.entity";
import { Question } from "./entities/question.entity";
import { QuestionOption } from "./entities/question-option.entity";
import { CandidateQuestionnaireResponse } from "./entities/candidate-questionnaire-response.entity";
import { CandidateSelectedOption } from "./entities/candidate-selected-option.entity";

config();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: process.env.DATABASE_URL,
    synchronize: false,
    logging: process.env.NODE_ENV === 'development',
    entities: [
        QuestionnaireTemplate,
        Question,
        QuestionOption,
        CandidateQuestionnaireResponse,
        CandidateSelectedOption
    ],
    migrations: [path.join(__dirname, 'migrations', '*.{ts,js}')],
});
