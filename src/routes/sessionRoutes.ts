import { Router } from 'express';
import { sessionController } from '../controllers/sessionController';

const router = Router();

// Recent interview sessions
router.get('/', sessionController.listRecent);

// Start a new interview session
router.post('/start', sessionController.startSession);

// Submit an answer to the open question
router.post('/:sessionId/answer', sessionController.submitAnswer);

// End interview session early
router.post('/:sessionId/end', sessionController.endSession);

// Final report, or progress while the interview runs
router.get('/:sessionId/report', sessionController.getReport);

// Persisted session row, answers and profile
router.get('/:sessionId/results', sessionController.getResults);

export default router;
