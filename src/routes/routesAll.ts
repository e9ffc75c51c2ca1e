import { Router, Request, Response } from 'express';

// user
import routeUserAuth from './user/userAuth.route';
import routeUserApiKey from './user/userApiKey.route';

// page -> contacts
import routesContactsCrud from './contacts/contactsCrud.route';
import routesContactsBirthday from './contacts/contactsBirthday.route';

// page -> notes
import routesNotesBook from './notes/notesBook.route';

// command catalog
import routesCommand from './command/command.route';

const router = Router();

router.get('/', (req: Request, res: Response) => {
    res.send('Welcome to the contacts and notes API');
});

// user
router.use('/user/auth', routeUserAuth);
router.use('/user/api-keys', routeUserApiKey);

// contacts
router.use('/contacts/crud', routesContactsCrud);
router.use('/contacts/birthday', routesContactsBirthday);

// notes
router.use('/notes/book', routesNotesBook);

// command
router.use('/command', routesCommand);

export default router;
