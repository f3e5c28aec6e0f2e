import { Modal } from "../Modal";
import { Button } from "../Button";

interface AlertDialogProps {
  isOpen: boolean;
  title: string;
  message: string;
  onDismiss: () => void;
}

export function AlertDialog({
  isOpen,
  title,
  message,
  onDismiss,
}: AlertDialogProps) {
  return (
    <Modal isOpen={isOpen} onClose={onDismiss} title={title} role="alertdialog">
      <p className="modal-message">{message}</p>
      <div className="modal-actions">
        <Button variant="primary" onClick={onDismiss} autoFocus>
          OK
        </Button>
      </div>
    </Modal>
  );
}
